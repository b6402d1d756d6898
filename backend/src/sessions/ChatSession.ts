import type { Environment } from 'nunjucks';
import type { LLMProfile } from '../configManager.js';
import { ModelInitializationError, errorMessage } from '../errors.js';
import { chatCompletion } from '../llm/client.js';
import { customLLMRequest } from '../llm/customClient.js';
import { buildChatMessages, buildCustomPrompt } from '../llm/messageBuilder.js';
import type { ChatMessage } from '../llm/types.js';
import { createLogger, NAMESPACES } from '../logging.js';
import { getTemplateEnvironment } from '../templates.js';

const sessionLog = createLogger(NAMESPACES.sessions.chat);

/**
 * One side of a dialogue with a model. Prior turns are kept as context.
 * `send` rejects with a RemoteCallError when the provider call fails.
 */
export interface ConversationSession {
  send(text: string): Promise<string>;
}

/**
 * Session backed by a live provider. Credentials and model travel with the
 * profile held by this instance; nothing is read from process-wide state.
 */
export class LLMChatSession implements ConversationSession {
  private readonly profile: LLMProfile;
  private readonly instruction: string;
  private readonly env: Environment;
  private readonly history: ChatMessage[] = [];

  constructor(profile: LLMProfile, instruction: string, env: Environment) {
    this.profile = profile;
    this.instruction = instruction;
    this.env = env;
  }

  async send(text: string): Promise<string> {
    const messages = buildChatMessages(this.instruction, this.history, text);
    sessionLog('Sending turn to %s (%d prior messages)', this.profile.model, this.history.length);

    const reply = this.profile.type === 'custom'
      ? await customLLMRequest(this.profile, buildCustomPrompt(messages, this.profile.template || 'chatml', this.env))
      : await chatCompletion(this.profile, messages);

    // Only completed exchanges become context for the next turn.
    this.history.push({ role: 'user', content: text }, { role: 'assistant', content: reply });
    return reply;
  }

  getHistory(): readonly ChatMessage[] {
    return this.history;
  }

  getModel(): string | undefined {
    return this.profile.model;
  }
}

export interface ChatSessionOptions {
  profile: LLMProfile;
  apiKey: string;
  model: string;
  instruction: string;
  env?: Environment;
}

export function createChatSession(options: ChatSessionOptions): LLMChatSession {
  const { profile, apiKey, model, instruction, env = getTemplateEnvironment() } = options;

  if (profile.type !== 'openai' && profile.type !== 'custom') {
    throw new ModelInitializationError(`Unsupported profile type: ${String(profile.type)}`);
  }
  if (!model.trim()) {
    throw new ModelInitializationError('A model name is required');
  }
  if (!profile.baseURL) {
    throw new ModelInitializationError(`No base URL configured for model ${model}`);
  }

  if (profile.type === 'custom') {
    const templateName = profile.template || 'chatml';
    try {
      env.getTemplate(`llm_templates/${templateName}.njk`);
    } catch (error) {
      throw new ModelInitializationError(`LLM template ${templateName} could not be loaded: ${errorMessage(error)}`, error);
    }
  }

  return new LLMChatSession({ ...profile, apiKey, model }, instruction, env);
}
