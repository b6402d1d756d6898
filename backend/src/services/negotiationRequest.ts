import { z } from 'zod';
import type { NegotiationSettings } from '../configManager.js';
import { RequestValidationError } from '../errors.js';

export function characterProfileSchema(defaultModel: string) {
  return z.object({
    name: z.string().min(1),
    profession: z.string(),
    background: z.string(),
    mood: z.string(),
    behavior: z.string(),
    objective: z.string(),
    strengths: z.string(),
    model_name: z.string().min(1).default(defaultModel),
  });
}

export function negotiationRequestSchema(settings: NegotiationSettings, defaultModel: string) {
  const character = characterProfileSchema(defaultModel);
  return z.object({
    topic: z.string().min(1),
    duration_seconds: z.number().int().min(0).max(settings.maxDurationSeconds).default(settings.defaultDurationSeconds),
    character1: character,
    character2: character,
  });
}

export type NegotiationRequest = z.infer<ReturnType<typeof negotiationRequestSchema>>;

export function parseNegotiationRequest(body: unknown, settings: NegotiationSettings, defaultModel: string): NegotiationRequest {
  const parsed = negotiationRequestSchema(settings, defaultModel).safeParse(body ?? {});
  if (!parsed.success) {
    throw new RequestValidationError(parsed.error.issues);
  }
  return parsed.data;
}
