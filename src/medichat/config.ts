export interface GeminiConfig {
  apiKey: string;
  baseUrl: string;
  textModel: string;
  visionModel: string;
  timeoutMs?: number;
}

export interface AppConfig {
  port: number;
  environment: string;
  corsOrigins: string[];
  jsonBodyLimit: string;
  gemini: GeminiConfig;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export const DEFAULT_GEMINI_BASE_URL = 'https://generativelanguage.googleapis.com';
export const DEFAULT_GEMINI_MODEL = 'gemini-2.5-flash';

const DEFAULT_CORS_ORIGINS = ['http://localhost:3000', 'http://localhost:5000', 'http://127.0.0.1:5000'];

function parsePositiveInt(name: string, raw: string): number {
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigError(`${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}

function nonEmpty(raw: string | undefined): string | undefined {
  const trimmed = raw?.trim();
  return trimmed ? trimmed : undefined;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const port = nonEmpty(env.PORT);
  const timeout = nonEmpty(env.GEMINI_TIMEOUT_MS);
  const origins = nonEmpty(env.CORS_ORIGINS);

  return {
    port: port ? parsePositiveInt('PORT', port) : 5000,
    environment: nonEmpty(env.NODE_ENV) ?? 'development',
    corsOrigins: origins
      ? origins.split(',').map(origin => origin.trim()).filter(Boolean)
      : DEFAULT_CORS_ORIGINS,
    jsonBodyLimit: nonEmpty(env.JSON_BODY_LIMIT) ?? '50mb',
    gemini: {
      apiKey: nonEmpty(env.GEMINI_API_KEY) ?? '',
      baseUrl: (nonEmpty(env.GEMINI_BASE_URL) ?? DEFAULT_GEMINI_BASE_URL).replace(/\/+$/, ''),
      textModel: nonEmpty(env.GEMINI_TEXT_MODEL) ?? DEFAULT_GEMINI_MODEL,
      visionModel: nonEmpty(env.GEMINI_VISION_MODEL) ?? DEFAULT_GEMINI_MODEL,
      timeoutMs: timeout ? parsePositiveInt('GEMINI_TIMEOUT_MS', timeout) : undefined
    }
  };
}

/**
 * Problems that should not stop the server but will break every AI call.
 */
export function configWarnings(config: AppConfig): string[] {
  const warnings: string[] = [];
  if (!config.gemini.apiKey) {
    warnings.push(
      'GEMINI_API_KEY environment variable not set. Requests to the AI service will be rejected until it is configured.'
    );
  }
  return warnings;
}
