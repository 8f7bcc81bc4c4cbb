import dotenv from 'dotenv';
import path from 'path';

export type AIProviderName = 'siliconflow' | 'openai';
export type TaskStoreKind = 'supabase' | 'memory';

export interface ParserConfig {
  apiUrl: string;
  allowedHosts: string[];
  timeoutMs: number;
}

export interface MediaConfig {
  mediaRoot: string;
  downloadTimeoutMs: number;
  ffmpegPath: string;
  ffmpegTimeoutMs: number;
}

export interface AIConfig {
  provider: AIProviderName;
  apiKey: string;
  baseUrl: string;
  transcriptionModel: string;
  summaryModel: string;
  timeoutMs: number;
}

export interface PipelineConfig {
  retryBaseDelayMs: number;
  workerConcurrency: number;
}

export interface SupabaseConfig {
  url: string;
  serviceRoleKey: string;
  anonKey: string;
}

export interface NotifierConfig {
  barkBaseUrl: string;
  barkDeviceKey: string | undefined;
}

const PROVIDER_DEFAULTS: Record<AIProviderName, { baseUrl: string; transcriptionModel: string; summaryModel: string }> = {
  siliconflow: {
    baseUrl: 'https://api.siliconflow.cn/v1',
    transcriptionModel: 'FunAudioLLM/SenseVoiceSmall',
    summaryModel: 'Qwen/QwQ-32B'
  },
  openai: {
    baseUrl: 'https://api.openai.com/v1',
    transcriptionModel: 'whisper-1',
    summaryModel: 'gpt-4'
  }
};

const DEFAULT_ALLOWED_HOSTS = 'v.douyin.com,douyin.com,iesdouyin.com';

function readInt(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw === '') return fallback;
  const value = parseInt(raw, 10);
  if (Number.isNaN(value) || value < 0) {
    console.warn(`Ignoring invalid ${name}=${raw}, using ${fallback}`);
    return fallback;
  }
  return value;
}

/**
 * Config Service - Reads the environment once and hands out typed sections.
 * Nothing downstream reads process.env directly.
 */
export class ConfigService {
  port: number;
  taskStore: TaskStoreKind;

  private readonly parserConfig: ParserConfig;
  private readonly mediaConfig: MediaConfig;
  private readonly aiConfig: AIConfig;
  private readonly pipelineConfig: PipelineConfig;
  private readonly supabaseConfig: SupabaseConfig;
  private readonly notifierConfig: NotifierConfig;

  constructor(env: NodeJS.ProcessEnv = ConfigService.loadEnvironment()) {
    this.port = readInt(env, 'PORT', 3001);
    this.taskStore = env.TASK_STORE === 'memory' ? 'memory' : 'supabase';

    this.supabaseConfig = {
      url: env.SUPABASE_URL || '',
      serviceRoleKey: env.SUPABASE_SERVICE_ROLE_KEY || '',
      anonKey: env.SUPABASE_ANON_KEY || ''
    };

    this.parserConfig = {
      apiUrl: env.PARSER_API_URL || '',
      allowedHosts: (env.PARSER_ALLOWED_HOSTS || DEFAULT_ALLOWED_HOSTS)
        .split(',')
        .map(host => host.trim().toLowerCase())
        .filter(Boolean),
      timeoutMs: readInt(env, 'PARSER_TIMEOUT_MS', 30000)
    };

    this.mediaConfig = {
      mediaRoot: env.MEDIA_ROOT || path.join(process.cwd(), 'temp', 'media'),
      downloadTimeoutMs: readInt(env, 'DOWNLOAD_TIMEOUT_MS', 60000),
      ffmpegPath: env.FFMPEG_PATH || 'ffmpeg',
      ffmpegTimeoutMs: readInt(env, 'FFMPEG_TIMEOUT_MS', 300000)
    };

    const provider: AIProviderName = env.AI_PROVIDER?.toLowerCase() === 'openai' ? 'openai' : 'siliconflow';
    const defaults = PROVIDER_DEFAULTS[provider];
    this.aiConfig = {
      provider,
      apiKey: (provider === 'openai' ? env.OPENAI_API_KEY : env.SILICONFLOW_API_KEY) || '',
      baseUrl: env.AI_BASE_URL || defaults.baseUrl,
      transcriptionModel: env.AI_TRANSCRIPTION_MODEL || defaults.transcriptionModel,
      summaryModel: env.AI_SUMMARY_MODEL || defaults.summaryModel,
      timeoutMs: readInt(env, 'AI_TIMEOUT_MS', 300000)
    };

    this.pipelineConfig = {
      retryBaseDelayMs: readInt(env, 'RETRY_BASE_DELAY_MS', 1000),
      workerConcurrency: Math.max(1, readInt(env, 'WORKER_CONCURRENCY', 2))
    };

    this.notifierConfig = {
      barkBaseUrl: env.BARK_BASE_URL || 'https://api.day.app',
      barkDeviceKey: env.BARK_DEVICE_KEY || undefined
    };
  }

  private static loadEnvironment(): NodeJS.ProcessEnv {
    dotenv.config();
    return process.env;
  }

  getParserConfig(): ParserConfig {
    return { ...this.parserConfig, allowedHosts: [...this.parserConfig.allowedHosts] };
  }

  getMediaConfig(): MediaConfig {
    return { ...this.mediaConfig };
  }

  getAIConfig(): AIConfig {
    return { ...this.aiConfig };
  }

  getPipelineConfig(): PipelineConfig {
    return { ...this.pipelineConfig };
  }

  getSupabaseConfig(): SupabaseConfig {
    return { ...this.supabaseConfig };
  }

  getNotifierConfig(): NotifierConfig {
    return { ...this.notifierConfig };
  }

  /**
   * Returns the names of required variables that are missing. The service
   * still starts; affected stages fail with a descriptive error.
   */
  validateEnvironment(): string[] {
    const requiredVars = [
      { name: 'PARSER_API_URL', value: this.parserConfig.apiUrl },
      {
        name: this.aiConfig.provider === 'openai' ? 'OPENAI_API_KEY' : 'SILICONFLOW_API_KEY',
        value: this.aiConfig.apiKey
      }
    ];

    if (this.taskStore === 'supabase') {
      requiredVars.push(
        { name: 'SUPABASE_URL', value: this.supabaseConfig.url },
        { name: 'SUPABASE_SERVICE_ROLE_KEY', value: this.supabaseConfig.serviceRoleKey }
      );
    }

    const missing = requiredVars.filter(({ value }) => !value).map(({ name }) => name);
    if (missing.length > 0) {
      console.warn(`Missing required environment variables: ${missing.join(', ')}`);
      console.warn('Pipeline stages depending on these variables will fail.');
    }
    return missing;
  }
}
