import type { Environment } from 'nunjucks';
import type { ConfigManager } from '../configManager.js';
import { ConfigurationError, errorMessage } from '../errors.js';
import { createLogger, NAMESPACES } from '../logging.js';
import { createChatSession } from '../sessions/ChatSession.js';
import { getTemplateEnvironment } from '../templates.js';
import { type Transcript, isTurnEntry } from '../types/Transcript.js';

const summarizeLog = createLogger(NAMESPACES.agents.summarize);

export const SUMMARY_NOT_STARTED = 'The negotiation did not start or an error occurred.';
export const SUMMARY_NO_CREDENTIALS = 'Summarization failed: API key not configured.';

/** Single-shot model call used to digest a finished transcript. */
export interface Summarizer {
  call(prompt: string): Promise<string>;
}

/** "speaker: message" lines for every successful turn; error records are left out. */
export function transcriptDigest(transcript: Transcript): string[] {
  return transcript.filter(isTurnEntry).map(entry => `${entry.speaker}: ${entry.message}`);
}

export function buildSummaryPrompt(lines: string[], topic: string, env: Environment = getTemplateEnvironment()): string {
  return env.render('prompts/summarize.njk', { topic, lines }).trim();
}

/**
 * Reduce a transcript to a neutral outcome summary. Always resolves to a
 * string: a transcript without any successful turn gets a fixed sentence and
 * no remote call, and a failed call becomes a descriptive message.
 */
export async function summarize(
  transcript: Transcript,
  topic: string,
  summarizer: Summarizer,
  env: Environment = getTemplateEnvironment()
): Promise<string> {
  const lines = transcriptDigest(transcript);
  if (lines.length === 0) {
    return SUMMARY_NOT_STARTED;
  }

  try {
    const prompt = buildSummaryPrompt(lines, topic, env);
    summarizeLog('Summarizing %d turns on %s', lines.length, topic);
    return await summarizer.call(prompt);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      return error.message;
    }
    summarizeLog('Summary failed: %s', errorMessage(error));
    return `Could not generate summary: ${errorMessage(error)}`;
  }
}

/**
 * Live summarizer. Always uses the primary credential and the configured
 * summarization model, whatever models the negotiators ran on.
 */
export class SummarizeAgent implements Summarizer {
  private readonly configManager: ConfigManager;
  private readonly env: Environment;

  constructor(configManager: ConfigManager, env: Environment = getTemplateEnvironment()) {
    this.configManager = configManager;
    this.env = env;
  }

  async call(prompt: string): Promise<string> {
    const { primary } = this.configManager.getCredentials();
    if (!primary) {
      throw new ConfigurationError(SUMMARY_NO_CREDENTIALS);
    }

    const settings = this.configManager.getSummarySettings();
    const session = createChatSession({
      profile: this.configManager.getProfile(settings.profile),
      apiKey: primary,
      model: settings.model,
      instruction: '',
      env: this.env
    });
    const response = await session.send(prompt);
    return response.trim();
  }
}
