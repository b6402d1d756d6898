import type { Environment } from 'nunjucks';
import type { ChatMessage } from './types.js';

/**
 * Builds an OpenAI-compatible messages array: the system instruction first,
 * then prior turns in order, then the new user message.
 */
export function buildChatMessages(systemInstruction: string, history: readonly ChatMessage[], userMessage: string): ChatMessage[] {
  const messages: ChatMessage[] = [];
  if (systemInstruction) {
    messages.push({ role: 'system', content: systemInstruction });
  }
  messages.push(...history);
  messages.push({ role: 'user', content: userMessage });
  return messages;
}

/**
 * Renders a custom LLM template (ChatML, Mistral, ...) over the message list
 * for backends that take a raw prompt.
 */
export function buildCustomPrompt(messages: ChatMessage[], templateName: string, env: Environment): string {
  return env.render(`llm_templates/${templateName}.njk`, { messages });
}
