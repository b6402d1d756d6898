import type { PacingSettings } from '../configManager.js';
import { errorMessage } from '../errors.js';
import { createLogger, NAMESPACES } from '../logging.js';
import type { ConversationSession } from '../sessions/ChatSession.js';
import type { Transcript } from '../types/Transcript.js';

const orchestratorLog = createLogger(NAMESPACES.agents.orchestrator);

export type NegotiationState = 'OPENING' | 'AWAITING_SPEAKER2' | 'AWAITING_SPEAKER1' | 'DONE';

export interface NegotiationOptions {
  /** Random delay before each send. Defaults to no delay. */
  pacing?: PacingSettings;
  /** Clock in milliseconds. */
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

/**
 * Runtime state of one negotiation. Created per call and discarded on return.
 */
interface NegotiationSession {
  session1: ConversationSession;
  session2: ConversationSession;
  speaker1: string;
  speaker2: string;
  deadline: number;
  turnCounter: number;
  currentMessage: string;
  state: NegotiationState;
  transcript: Transcript;
}

const NO_PACING: PacingSettings = { minMs: 0, maxMs: 0 };

async function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export function pacingDelay(pacing: PacingSettings, random: () => number = Math.random): number {
  const min = Math.max(0, pacing.minMs);
  const max = Math.max(min, pacing.maxMs);
  return min + random() * (max - min);
}

/**
 * Drive an alternating dialogue between two sessions until the deadline passes
 * or a send fails. Speaker 1 opens with `initialPrompt`; each later turn replies
 * to the previous turn's message.
 *
 * The deadline is checked between turns only, so a call that has started runs
 * to completion. A failed send appends a single `{ error }` record and ends the
 * run; turns already recorded are kept. This function never rejects.
 */
export async function runNegotiation(
  session1: ConversationSession,
  session2: ConversationSession,
  speaker1Label: string,
  speaker2Label: string,
  initialPrompt: string,
  durationSeconds: number,
  options: NegotiationOptions = {}
): Promise<Transcript> {
  const now = options.now ?? Date.now;
  const wait = options.sleep ?? sleep;
  const random = options.random ?? Math.random;
  const pacing = options.pacing ?? NO_PACING;

  orchestratorLog('Starting negotiation between %s and %s for %ds', speaker1Label, speaker2Label, durationSeconds);

  const startedAt = now();
  const run: NegotiationSession = {
    session1,
    session2,
    speaker1: speaker1Label,
    speaker2: speaker2Label,
    deadline: startedAt + durationSeconds * 1000,
    turnCounter: 0,
    currentMessage: initialPrompt,
    state: 'OPENING',
    transcript: []
  };

  const expired = () => now() >= run.deadline;

  // Resolves false after recording the failure.
  const takeTurn = async (session: ConversationSession, speaker: string, turn: number): Promise<boolean> => {
    try {
      const delayMs = pacingDelay(pacing, random);
      if (delayMs > 0) {
        orchestratorLog('[%s is considering a response...]', speaker);
        await wait(delayMs);
      }
      const reply = await session.send(run.currentMessage);
      run.transcript.push({ turn, speaker, message: reply });
      run.currentMessage = reply;
      orchestratorLog('%s: %s', speaker, reply);
      return true;
    } catch (error) {
      const message = errorMessage(error);
      orchestratorLog('Negotiation aborted on turn %d (%s): %s', turn, speaker, message);
      run.transcript.push({ error: message });
      return false;
    }
  };

  while (run.state !== 'DONE') {
    switch (run.state) {
      case 'OPENING':
        if (!(await takeTurn(run.session1, run.speaker1, run.turnCounter))) {
          run.state = 'DONE';
          break;
        }
        run.turnCounter += 1;
        run.state = expired() ? 'DONE' : 'AWAITING_SPEAKER2';
        break;

      case 'AWAITING_SPEAKER2':
        if (!(await takeTurn(run.session2, run.speaker2, run.turnCounter))) {
          run.state = 'DONE';
          break;
        }
        // Speaker 1 gets no closing turn once time is up.
        run.state = expired() ? 'DONE' : 'AWAITING_SPEAKER1';
        break;

      case 'AWAITING_SPEAKER1':
        if (!(await takeTurn(run.session1, run.speaker1, run.turnCounter + 1))) {
          run.state = 'DONE';
          break;
        }
        run.turnCounter += 2;
        run.state = expired() ? 'DONE' : 'AWAITING_SPEAKER2';
        break;
    }
  }

  orchestratorLog('Negotiation finished with %d records', run.transcript.length);
  return run.transcript;
}
