import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { dirname } from 'path';
import { createLogger, NAMESPACES } from './logging.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const configLog = createLogger(NAMESPACES.config);

export interface SamplerSettings {
  temperature?: number;
  topP?: number;
  max_completion_tokens?: number;
  frequencyPenalty?: number;
  presencePenalty?: number;
  stop?: string[];
}

export interface LLMProfile {
  type: 'openai' | 'custom'; // 'openai' uses OpenAI SDK, 'custom' uses axios with templates
  apiKey?: string;
  baseURL: string;
  model?: string;
  template?: string; // LLM template name for 'custom' profiles, e.g. 'chatml'
  sampler?: SamplerSettings;
}

export interface CredentialSettings {
  primaryApiKey?: string;
  secondaryApiKey?: string; // falls back to primaryApiKey
}

export interface PacingSettings {
  minMs: number;
  maxMs: number;
}

export interface NegotiationSettings {
  defaultDurationSeconds: number;
  maxDurationSeconds: number;
  pacing: PacingSettings;
}

export interface SummarySettings {
  profile?: string; // defaults to defaultProfile
  model: string;
}

export interface DebugSettings {
  enabledNamespaces?: string;
}

export interface Config {
  profiles: Record<string, LLMProfile>;
  defaultProfile: string;
  credentials: CredentialSettings;
  negotiation: NegotiationSettings;
  summary: SummarySettings;
  debug?: DebugSettings;
}

/** Shape of localConfig/config.json; every section is optional. */
export interface ConfigFile {
  profiles?: Record<string, LLMProfile>;
  defaultProfile?: string;
  credentials?: CredentialSettings;
  negotiation?: Partial<Omit<NegotiationSettings, 'pacing'>> & { pacing?: Partial<PacingSettings> };
  summary?: Partial<SummarySettings>;
  debug?: DebugSettings;
}

export interface ResolvedCredentials {
  primary?: string;
  secondary?: string;
}

export const DEFAULT_MODEL = 'gemini-1.5-flash';
export const GEMINI_OPENAI_BASE_URL = 'https://generativelanguage.googleapis.com/v1beta/openai/';

export function defaultConfig(): Config {
  return {
    defaultProfile: 'gemini',
    profiles: {
      gemini: {
        type: 'openai',
        baseURL: GEMINI_OPENAI_BASE_URL,
        model: DEFAULT_MODEL,
        sampler: { temperature: 0.9 }
      }
    },
    credentials: {},
    negotiation: {
      defaultDurationSeconds: 60,
      maxDurationSeconds: 600,
      pacing: { minMs: 2000, maxMs: 5000 }
    },
    summary: { model: DEFAULT_MODEL },
    debug: { enabledNamespaces: 'parley:*' }
  };
}

function nonEmpty(value: string | undefined): string | undefined {
  return value && value.trim() !== '' ? value : undefined;
}

export class ConfigManager {
  private config: Config;
  private readonly env: NodeJS.ProcessEnv;

  constructor(
    configPath: string = path.join(__dirname, '..', '..', 'localConfig', 'config.json'),
    env: NodeJS.ProcessEnv = process.env
  ) {
    this.env = env;
    this.config = this.loadConfig(configPath);
  }

  private loadConfig(configPath: string): Config {
    const base = defaultConfig();
    let file: ConfigFile = {};
    if (fs.existsSync(configPath)) {
      file = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
      configLog('Loaded config from %s', configPath);
    } else {
      configLog('No config at %s, using defaults', configPath);
    }

    const merged: Config = {
      defaultProfile: file.defaultProfile ?? base.defaultProfile,
      profiles: { ...base.profiles, ...file.profiles },
      credentials: { ...base.credentials, ...file.credentials },
      negotiation: {
        ...base.negotiation,
        ...file.negotiation,
        pacing: { ...base.negotiation.pacing, ...file.negotiation?.pacing }
      },
      summary: { ...base.summary, ...file.summary },
      debug: { ...base.debug, ...file.debug }
    };

    return this.applyEnvironment(merged);
  }

  private applyEnvironment(config: Config): Config {
    const primary = nonEmpty(this.env.GOOGLE_API_KEY) ?? config.credentials.primaryApiKey;
    const secondary = nonEmpty(this.env.GOOGLE_API_KEY_2) ?? config.credentials.secondaryApiKey;
    const baseURL = nonEmpty(this.env.PARLEY_BASE_URL);

    const profiles = { ...config.profiles };
    const defaultProfile = profiles[config.defaultProfile];
    if (baseURL && defaultProfile) {
      profiles[config.defaultProfile] = { ...defaultProfile, baseURL };
    }

    if (!primary) {
      console.warn('[configManager] GOOGLE_API_KEY is not set; negotiation requests will be rejected.');
    }

    return {
      ...config,
      profiles,
      credentials: { primaryApiKey: primary, secondaryApiKey: secondary }
    };
  }

  getProfile(name?: string): LLMProfile {
    const profileName = name || this.config.defaultProfile;
    const profile = this.config.profiles[profileName];
    if (!profile) {
      throw new Error(`Profile ${profileName} not found`);
    }
    return profile;
  }

  getDefaultProfile(): LLMProfile {
    return this.getProfile();
  }

  getConfig(): Config {
    return { ...this.config };
  }

  /**
   * Two credential slots; the second defaults to the first when absent.
   */
  getCredentials(): ResolvedCredentials {
    const primary = this.config.credentials.primaryApiKey;
    return {
      primary,
      secondary: this.config.credentials.secondaryApiKey ?? primary
    };
  }

  getNegotiationSettings(): NegotiationSettings {
    return this.config.negotiation;
  }

  getSummarySettings(): SummarySettings {
    return this.config.summary;
  }
}
