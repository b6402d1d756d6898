import { describe, it, expect, vi, beforeEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

vi.mock('../llm/client.js', () => ({
  chatCompletion: vi.fn()
}));

import { chatCompletion } from '../llm/client.js';
import {
  SUMMARY_NOT_STARTED,
  SUMMARY_NO_CREDENTIALS,
  SummarizeAgent,
  type Summarizer,
  summarize,
  transcriptDigest
} from '../agents/SummarizeAgent.js';
import { ConfigManager } from '../configManager.js';
import { ConfigurationError, RemoteCallError } from '../errors.js';
import type { Transcript } from '../types/Transcript.js';

const missingConfigPath = path.join(os.tmpdir(), 'parley-summarize-test-missing.json');

const finished: Transcript = [
  { turn: 0, speaker: 'One', message: 'I want 20% off.' },
  { turn: 1, speaker: 'Two', message: 'I can do 5%.' },
  { error: 'quota exceeded' }
];

function fakeSummarizer(reply: string | Error = 'They settled on 10%.') {
  const call = vi.fn(async (_prompt: string) => {
    if (reply instanceof Error) throw reply;
    return reply;
  });
  const summarizer: Summarizer = { call };
  return { summarizer, call };
}

describe('summarize', () => {
  it('returns the fixed sentence for an empty transcript without calling the model', async () => {
    const { summarizer, call } = fakeSummarizer();
    await expect(summarize([], 'pricing', summarizer)).resolves.toBe(SUMMARY_NOT_STARTED);
    expect(call).not.toHaveBeenCalled();
  });

  it('treats a transcript holding only an error record as not started', async () => {
    const { summarizer, call } = fakeSummarizer();
    await expect(summarize([{ error: 'invalid api key' }], 'pricing', summarizer)).resolves.toBe(
      'The negotiation did not start or an error occurred.'
    );
    expect(call).not.toHaveBeenCalled();
  });

  it('sends one prompt with the successful turns and leaves error records out', async () => {
    const { summarizer, call } = fakeSummarizer();

    const result = await summarize(finished, 'pricing', summarizer);

    expect(result).toBe('They settled on 10%.');
    expect(call).toHaveBeenCalledTimes(1);
    const prompt = call.mock.calls[0][0];
    expect(prompt.startsWith("Based on the following negotiation transcript about 'pricing'")).toBe(true);
    expect(prompt).toContain('1. What was the final position of each party?');
    expect(prompt.endsWith('Transcript:\n---\nOne: I want 20% off.\nTwo: I can do 5%.\n---')).toBe(true);
    expect(prompt).not.toContain('quota exceeded');
  });

  it('turns a failed call into an explanatory string', async () => {
    const { summarizer } = fakeSummarizer(new RemoteCallError('503 Service Unavailable'));
    await expect(summarize(finished, 'pricing', summarizer)).resolves.toBe('Could not generate summary: 503 Service Unavailable');
  });

  it('passes configuration failures through as their own message', async () => {
    const { summarizer } = fakeSummarizer(new ConfigurationError(SUMMARY_NO_CREDENTIALS));
    await expect(summarize(finished, 'pricing', summarizer)).resolves.toBe('Summarization failed: API key not configured.');
  });
});

describe('transcriptDigest', () => {
  it('formats entries as speaker: message lines', () => {
    expect(transcriptDigest(finished)).toEqual(['One: I want 20% off.', 'Two: I can do 5%.']);
  });
});

describe('SummarizeAgent', () => {
  const mockedCompletion = vi.mocked(chatCompletion);

  beforeEach(() => {
    mockedCompletion.mockReset();
  });

  it('uses the primary key and the fixed summarization model', async () => {
    mockedCompletion.mockResolvedValue('  Agreement at 10%.  ');
    const configManager = new ConfigManager(missingConfigPath, {
      GOOGLE_API_KEY: 'test-primary',
      GOOGLE_API_KEY_2: 'test-secondary'
    });
    const agent = new SummarizeAgent(configManager);

    await expect(agent.call('digest this')).resolves.toBe('Agreement at 10%.');

    expect(mockedCompletion).toHaveBeenCalledTimes(1);
    const [profile, messages] = mockedCompletion.mock.calls[0];
    expect(profile.apiKey).toBe('test-primary');
    expect(profile.model).toBe('gemini-1.5-flash');
    expect(messages).toEqual([{ role: 'user', content: 'digest this' }]);
  });

  it('honours a configured summary model', async () => {
    mockedCompletion.mockResolvedValue('ok');
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'parley-summary-'));
    const configPath = path.join(dir, 'config.json');
    fs.writeFileSync(configPath, JSON.stringify({ summary: { model: 'gemini-1.5-pro' } }));
    const agent = new SummarizeAgent(new ConfigManager(configPath, { GOOGLE_API_KEY: 'test-primary' }));

    await agent.call('digest this');

    expect(mockedCompletion.mock.calls[0][0].model).toBe('gemini-1.5-pro');
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('reports missing credentials without calling the model', async () => {
    const agent = new SummarizeAgent(new ConfigManager(missingConfigPath, {}));

    await expect(summarize(finished, 'pricing', agent)).resolves.toBe(SUMMARY_NO_CREDENTIALS);
    expect(mockedCompletion).not.toHaveBeenCalled();
  });

  it('reports live provider failures through summarize', async () => {
    mockedCompletion.mockRejectedValue(new RemoteCallError('model not found'));
    const agent = new SummarizeAgent(new ConfigManager(missingConfigPath, { GOOGLE_API_KEY: 'test-primary' }));

    await expect(summarize(finished, 'pricing', agent)).resolves.toBe('Could not generate summary: model not found');
  });
});
