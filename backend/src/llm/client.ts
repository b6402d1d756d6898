import OpenAI from 'openai';
import type { LLMProfile } from '../configManager.js';
import { RemoteCallError, errorMessage } from '../errors.js';
import { createLogger, NAMESPACES } from '../logging.js';
import type { ChatMessage } from './types.js';

export type { ChatMessage } from './types.js';

const clientLog = createLogger(NAMESPACES.llm.client);

/**
 * One chat completion against an OpenAI-compatible endpoint. A single attempt:
 * SDK retries are disabled and any provider failure surfaces as a RemoteCallError.
 */
export async function chatCompletion(profile: LLMProfile, messages: ChatMessage[]): Promise<string> {
  const client = new OpenAI({
    apiKey: profile.apiKey || 'dummy',
    baseURL: profile.baseURL,
    maxRetries: 0,
  });

  const model = profile.model || 'gemini-1.5-flash';

  const samplerOptions = profile.sampler ? {
    temperature: profile.sampler.temperature,
    top_p: profile.sampler.topP,
    max_completion_tokens: profile.sampler.max_completion_tokens,
    frequency_penalty: profile.sampler.frequencyPenalty,
    presence_penalty: profile.sampler.presencePenalty,
    stop: profile.sampler.stop,
  } : {};

  try {
    clientLog('Making call to %s at %s (%d messages)', model, profile.baseURL, messages.length);
    const response = await client.chat.completions.create({
      model,
      messages,
      ...samplerOptions,
    });
    return response.choices[0]?.message?.content || '';
  } catch (error) {
    clientLog('API call failed: profile=%s model=%s error=%s', profile.baseURL, model, errorMessage(error));
    throw new RemoteCallError(errorMessage(error), error);
  }
}
