import { z } from 'zod';

export type TransportMode = 'stdio' | 'http' | 'both';

export type AnalysisMode = 'auto' | 'heuristic';

const numberFromEnv = (defaultValue: number, min: number, max: number) =>
  z.coerce.number().int().min(min).max(max).default(defaultValue);

const booleanFromEnv = (defaultValue: boolean) =>
  z.preprocess((value) => {
    if (typeof value === 'boolean') {
      return value;
    }

    if (typeof value === 'number') {
      return value !== 0;
    }

    if (typeof value === 'string') {
      const normalized = value.trim().toLowerCase();
      if (['1', 'true', 'yes', 'on'].includes(normalized)) {
        return true;
      }
      if (['0', 'false', 'no', 'off'].includes(normalized)) {
        return false;
      }
    }

    return value;
  }, z.boolean().default(defaultValue));

// An empty string in .env means "unset", not "invalid URL".
const optionalUrlFromEnv = () =>
  z.preprocess((value) => (typeof value === 'string' && value.trim().length === 0 ? undefined : value), z.string().url().optional());

const envSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
    PAPERLENS_SERVER_NAME: z.string().default('paperlens-mcp'),
    PAPERLENS_SERVER_VERSION: z.string().default('1.0.0'),
    PAPERLENS_TRANSPORT: z.enum(['stdio', 'http', 'both']).default('stdio'),
    PAPERLENS_HOST: z.string().default('127.0.0.1'),
    PAPERLENS_PORT: numberFromEnv(3000, 1, 65535),
    PAPERLENS_ENDPOINT_PATH: z.string().default('/mcp'),
    PAPERLENS_HEALTH_PATH: z.string().default('/health'),
    PAPERLENS_ALLOWED_ORIGINS: z.string().optional(),
    PAPERLENS_ALLOWED_HOSTS: z.string().optional(),
    PAPERLENS_API_KEY: z.string().optional(),
    ANALYSIS_MODE: z.enum(['auto', 'heuristic']).default('auto'),
    ANALYSIS_CAPABILITY_TIMEOUT_MS: numberFromEnv(20000, 100, 300000),
    ANALYSIS_COMPLETION_WINDOW_CHARS: numberFromEnv(4000, 500, 100000),
    ANALYSIS_CHUNK_SIZE: numberFromEnv(200, 1, 5000),
    ANALYSIS_CHUNK_OVERLAP: numberFromEnv(40, 0, 4999),
    ANALYSIS_MIN_CHUNK_LENGTH: numberFromEnv(50, 0, 10000),
    ANALYSIS_OPENAI_API_KEY: z.string().optional(),
    ANALYSIS_OPENAI_BASE_URL: optionalUrlFromEnv(),
    ANALYSIS_COMPLETION_MODEL: z.string().default('gpt-4o-mini'),
    ANALYSIS_EMBEDDING_MODEL: z.string().default('text-embedding-3-small'),
    EXTRACTION_MIN_TEXT_LENGTH: numberFromEnv(100, 1, 1000000),
    EXTRACTION_GROBID_URL: optionalUrlFromEnv(),
    EXTRACTION_TIMEOUT_MS: numberFromEnv(30000, 1000, 300000),
    EXTRACTION_RETRY_ATTEMPTS: numberFromEnv(1, 0, 5),
    EXTRACTION_RETRY_DELAY_MS: numberFromEnv(500, 0, 30000),
    EXTRACTION_ALLOW_LOCAL_FILES: booleanFromEnv(true)
  })
  .superRefine((env, ctx) => {
    if (env.ANALYSIS_CHUNK_OVERLAP >= env.ANALYSIS_CHUNK_SIZE) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['ANALYSIS_CHUNK_OVERLAP'],
        message: 'ANALYSIS_CHUNK_OVERLAP must be smaller than ANALYSIS_CHUNK_SIZE.'
      });
    }
  });

type ParsedEnv = z.infer<typeof envSchema>;

const splitCsv = (value?: string): string[] => {
  if (!value) {
    return [];
  }

  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
};

const normalizePath = (value: string): string => {
  const withPrefix = value.startsWith('/') ? value : `/${value}`;
  return withPrefix.length > 1 && withPrefix.endsWith('/') ? withPrefix.slice(0, -1) : withPrefix;
};

const emptyToUndefined = (value?: string): string | undefined =>
  value && value.trim().length > 0 ? value.trim() : undefined;

export interface AppConfig {
  nodeEnv: ParsedEnv['NODE_ENV'];
  logLevel: ParsedEnv['LOG_LEVEL'];
  serverName: string;
  serverVersion: string;
  transport: TransportMode;
  host: string;
  port: number;
  endpointPath: string;
  healthPath: string;
  allowedOrigins: string[];
  allowedHosts: string[];
  apiKey?: string;
  analysisMode: AnalysisMode;
  capabilityTimeoutMs: number;
  completionWindowChars: number;
  chunkSize: number;
  chunkOverlap: number;
  minChunkLength: number;
  openAiApiKey?: string;
  openAiBaseUrl?: string;
  completionModel: string;
  embeddingModel: string;
  extractionMinTextLength: number;
  extractionGrobidUrl?: string;
  extractionTimeoutMs: number;
  extractionRetryAttempts: number;
  extractionRetryDelayMs: number;
  extractionAllowLocalFiles: boolean;
}

export type ConfigOverrides = Partial<Record<keyof ParsedEnv, string | number | boolean>>;

export const parseConfig = (overrides?: ConfigOverrides): AppConfig => {
  const mergedEnv: Record<string, string | number | boolean | undefined> = {
    ...process.env,
    ...(overrides ?? {})
  };

  const env = envSchema.parse(mergedEnv);

  return {
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
    serverName: env.PAPERLENS_SERVER_NAME,
    serverVersion: env.PAPERLENS_SERVER_VERSION,
    transport: env.PAPERLENS_TRANSPORT,
    host: env.PAPERLENS_HOST,
    port: env.PAPERLENS_PORT,
    endpointPath: normalizePath(env.PAPERLENS_ENDPOINT_PATH),
    healthPath: normalizePath(env.PAPERLENS_HEALTH_PATH),
    allowedOrigins: splitCsv(env.PAPERLENS_ALLOWED_ORIGINS),
    allowedHosts: splitCsv(env.PAPERLENS_ALLOWED_HOSTS).map((host) => host.toLowerCase()),
    apiKey: emptyToUndefined(env.PAPERLENS_API_KEY),
    analysisMode: env.ANALYSIS_MODE,
    capabilityTimeoutMs: env.ANALYSIS_CAPABILITY_TIMEOUT_MS,
    completionWindowChars: env.ANALYSIS_COMPLETION_WINDOW_CHARS,
    chunkSize: env.ANALYSIS_CHUNK_SIZE,
    chunkOverlap: env.ANALYSIS_CHUNK_OVERLAP,
    minChunkLength: env.ANALYSIS_MIN_CHUNK_LENGTH,
    openAiApiKey: emptyToUndefined(env.ANALYSIS_OPENAI_API_KEY),
    openAiBaseUrl: env.ANALYSIS_OPENAI_BASE_URL,
    completionModel: env.ANALYSIS_COMPLETION_MODEL,
    embeddingModel: env.ANALYSIS_EMBEDDING_MODEL,
    extractionMinTextLength: env.EXTRACTION_MIN_TEXT_LENGTH,
    extractionGrobidUrl: env.EXTRACTION_GROBID_URL,
    extractionTimeoutMs: env.EXTRACTION_TIMEOUT_MS,
    extractionRetryAttempts: env.EXTRACTION_RETRY_ATTEMPTS,
    extractionRetryDelayMs: env.EXTRACTION_RETRY_DELAY_MS,
    extractionAllowLocalFiles: env.EXTRACTION_ALLOW_LOCAL_FILES
  };
};
