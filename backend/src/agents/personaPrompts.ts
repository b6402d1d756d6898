import type { Environment } from 'nunjucks';
import type { CharacterProfile, PersonaTraits } from '../types/Character.js';
import { getTemplateEnvironment } from '../templates.js';

/**
 * Render the system instruction for one persona. Deterministic; every trait is
 * substituted verbatim.
 */
export function buildInstruction(profile: PersonaTraits, env: Environment = getTemplateEnvironment()): string {
  const traits: PersonaTraits = {
    name: profile.name,
    profession: profile.profession,
    background: profile.background,
    mood: profile.mood,
    behavior: profile.behavior,
    objective: profile.objective,
    strengths: profile.strengths
  };
  return env.render('prompts/persona.njk', traits).trim();
}

export function buildOpeningPrompt(
  speaker: CharacterProfile,
  counterpart: CharacterProfile,
  topic: string,
  env: Environment = getTemplateEnvironment()
): string {
  return env.render('prompts/opening.njk', { speaker, counterpart, topic }).trim();
}

/** Transcript label, e.g. "Asha Rao (from India)". */
export function speakerLabel(profile: Pick<CharacterProfile, 'name' | 'background'>): string {
  return `${profile.name} (${profile.background})`;
}
