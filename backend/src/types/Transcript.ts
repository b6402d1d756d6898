export interface TurnEntry {
  turn: number;
  speaker: string;
  message: string;
}

/** Terminal failure marker. Carries no turn index or speaker. */
export interface TurnError {
  error: string;
}

export type TurnRecord = TurnEntry | TurnError;

export type Transcript = TurnRecord[];

export function isTurnError(record: TurnRecord): record is TurnError {
  return 'error' in record;
}

export function isTurnEntry(record: TurnRecord): record is TurnEntry {
  return !isTurnError(record);
}
