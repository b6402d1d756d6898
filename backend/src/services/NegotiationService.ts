import type { Environment } from 'nunjucks';
import type { ConfigManager } from '../configManager.js';
import { ConfigurationError, ModelInitializationError, errorMessage } from '../errors.js';
import { createLogger, NAMESPACES } from '../logging.js';
import { type NegotiationOptions, runNegotiation } from '../agents/NegotiationOrchestrator.js';
import { buildInstruction, buildOpeningPrompt, speakerLabel } from '../agents/personaPrompts.js';
import { SummarizeAgent, type Summarizer, summarize } from '../agents/SummarizeAgent.js';
import { type ChatSessionOptions, type ConversationSession, createChatSession } from '../sessions/ChatSession.js';
import { getTemplateEnvironment } from '../templates.js';
import type { CharacterProfile } from '../types/Character.js';
import type { Transcript } from '../types/Transcript.js';
import type { NegotiationRequest } from './negotiationRequest.js';

const negotiationLog = createLogger(NAMESPACES.services.negotiation);

export const MISSING_KEYS_MESSAGE = 'API keys are not configured on the server. Please check environment variables.';

export interface NegotiationResponse {
  negotiation_summary: {
    topic: string;
    duration_seconds: number;
    outcome_analysis: string;
  };
  participants: [CharacterProfile, CharacterProfile];
  transcript: Transcript;
}

export type SessionFactory = (options: ChatSessionOptions) => ConversationSession;

export interface NegotiationServiceDeps {
  createSession?: SessionFactory;
  summarizer?: Summarizer;
  env?: Environment;
  now?: () => number;
  /** Overrides for the turn loop; pacing defaults to the configured policy. */
  orchestration?: Omit<NegotiationOptions, 'now'>;
}

export class NegotiationService {
  private readonly configManager: ConfigManager;
  private readonly createSession: SessionFactory;
  private readonly summarizer: Summarizer;
  private readonly env: Environment;
  private readonly now: () => number;
  private readonly orchestration: Omit<NegotiationOptions, 'now'>;

  constructor(configManager: ConfigManager, deps: NegotiationServiceDeps = {}) {
    this.configManager = configManager;
    this.env = deps.env ?? getTemplateEnvironment();
    this.createSession = deps.createSession ?? createChatSession;
    this.summarizer = deps.summarizer ?? new SummarizeAgent(configManager, this.env);
    this.now = deps.now ?? Date.now;
    this.orchestration = deps.orchestration ?? {};
  }

  /**
   * Fails before any model work when credentials are missing or a session
   * cannot be built. Once the turn loop starts, the request always completes;
   * model failures show up in the transcript and summary instead.
   */
  async negotiate(request: NegotiationRequest): Promise<NegotiationResponse> {
    const { character1, character2, topic } = request;
    const startedAt = this.now();

    const [session1, session2] = this.openSessions(character1, character2);
    const initialPrompt = buildOpeningPrompt(character1, character2, topic, this.env);

    const transcript = await runNegotiation(
      session1,
      session2,
      speakerLabel(character1),
      speakerLabel(character2),
      initialPrompt,
      request.duration_seconds,
      {
        pacing: this.configManager.getNegotiationSettings().pacing,
        ...this.orchestration,
        now: this.now
      }
    );

    negotiationLog('Generating final summary...');
    const outcome = await summarize(transcript, topic, this.summarizer, this.env);

    return {
      negotiation_summary: {
        topic,
        duration_seconds: Math.round((this.now() - startedAt) / 1000),
        outcome_analysis: outcome
      },
      participants: [character1, character2],
      transcript
    };
  }

  private openSessions(character1: CharacterProfile, character2: CharacterProfile): [ConversationSession, ConversationSession] {
    const { primary, secondary } = this.configManager.getCredentials();
    if (!primary || !secondary) {
      throw new ConfigurationError(MISSING_KEYS_MESSAGE);
    }

    try {
      const profile = this.configManager.getDefaultProfile();
      const session1 = this.createSession({
        profile,
        apiKey: primary,
        model: character1.model_name,
        instruction: buildInstruction(character1, this.env),
        env: this.env
      });
      const session2 = this.createSession({
        profile,
        apiKey: secondary,
        model: character2.model_name,
        instruction: buildInstruction(character2, this.env),
        env: this.env
      });
      return [session1, session2];
    } catch (error) {
      negotiationLog('Session construction failed: %s', errorMessage(error));
      throw new ModelInitializationError(`Failed to initialize AI models: ${errorMessage(error)}`, error);
    }
  }
}

export default NegotiationService;
