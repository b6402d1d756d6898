/**
 * A negotiating persona. Immutable once a negotiation starts.
 */
export interface CharacterProfile {
  name: string;
  profession: string;
  background: string; // e.g. "from India" or "representing CyberCorp"
  mood: string;
  behavior: string;
  objective: string;
  strengths: string;
  model_name: string; // per-character model identifier
}

/** The seven fields that describe who the persona is, without the model routing. */
export type PersonaTraits = Omit<CharacterProfile, 'model_name'>;
