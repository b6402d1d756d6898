import axios from 'axios';
import type { LLMProfile } from '../configManager.js';
import { RemoteCallError, errorMessage } from '../errors.js';
import { createLogger, NAMESPACES } from '../logging.js';

const customLog = createLogger(NAMESPACES.llm.custom);

export interface CustomClientOptions {
  timeout?: number;
}

interface CompletionChoice {
  text?: string;
  message?: { content?: string };
}

interface CompletionResponse {
  choices?: CompletionChoice[];
  result?: string;
  error?: { message?: string };
}

function describeFailure(error: unknown): string {
  if (axios.isAxiosError<CompletionResponse>(error)) {
    return error.response?.data?.error?.message || error.message;
  }
  return errorMessage(error);
}

/**
 * Custom LLM client using axios for non-OpenAI compatible endpoints.
 * Sends raw rendered prompts directly to the LLM backend.
 */
export async function customLLMRequest(
  profile: LLMProfile,
  renderedPrompt: string,
  options: CustomClientOptions = {}
): Promise<string> {
  const { timeout = 120000 } = options;

  const requestBody = {
    prompt: renderedPrompt,
    model: profile.model,
    max_tokens: profile.sampler?.max_completion_tokens || 512,
    temperature: profile.sampler?.temperature || 0.7,
    top_p: profile.sampler?.topP || 0.9,
    ...(profile.sampler?.frequencyPenalty !== undefined && { frequency_penalty: profile.sampler.frequencyPenalty }),
    ...(profile.sampler?.presencePenalty !== undefined && { presence_penalty: profile.sampler.presencePenalty }),
    ...(profile.sampler?.stop && profile.sampler.stop.length > 0 && { stop: profile.sampler.stop }),
  };

  try {
    customLog('Posting to %s with model %s', profile.baseURL, profile.model);

    const response = await axios.post<CompletionResponse>(`${profile.baseURL}/completions`, requestBody, {
      timeout,
      headers: {
        'Content-Type': 'application/json',
        ...(profile.apiKey && { Authorization: `Bearer ${profile.apiKey}` }),
      },
    });

    // Support both 'text' (completions API) and 'message.content' (chat format)
    const choice = response.data.choices?.[0];
    if (choice) {
      return choice.text || choice.message?.content || '';
    }

    if (response.data.result) {
      return response.data.result;
    }

    customLog('Unexpected response format: %o', response.data);
    return '';
  } catch (error) {
    const message = describeFailure(error);
    customLog('Request failed: %s', message);
    throw new RemoteCallError(message, error);
  }
}
