import { existsSync, readFileSync, mkdirSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';
import writeFileAtomic from 'write-file-atomic';
import { z } from 'zod';
import { ValidationError } from './errors.js';
import { logger } from './logger.js';

export const APP_NAME = 'reddit-or-replicant';
export const APP_VERSION = '1.0.0';

// Supported AI providers
export const AI_PROVIDERS = ['anthropic', 'openai', 'google', 'xai'] as const;
export type AIProvider = typeof AI_PROVIDERS[number];

const ConfigSchema = z.object({
  // Active provider
  provider: z.enum(AI_PROVIDERS).default('anthropic'),

  // API keys for each provider
  anthropicApiKey: z.string().optional(),
  openaiApiKey: z.string().optional(),
  googleApiKey: z.string().optional(),      // Gemini
  xaiApiKey: z.string().optional(),         // Grok

  // Overrides the provider's default model
  model: z.string().optional(),

  // Metadata
  createdAt: z.string().default(() => new Date().toISOString()),
  lastUsed: z.string().default(() => new Date().toISOString()),
});

export type ReplicantConfig = z.infer<typeof ConfigSchema>;

function configDir(): string {
  return process.env.REPLICANT_HOME || join(homedir(), '.replicant');
}

export function configPath(): string {
  return join(configDir(), 'config.json');
}

function defaultConfig(): ReplicantConfig {
  return ConfigSchema.parse({});
}

export function loadConfig(): ReplicantConfig {
  const file = configPath();
  if (!existsSync(file)) {
    return defaultConfig();
  }

  try {
    const raw = readFileSync(file, 'utf-8');
    const result = ConfigSchema.safeParse(JSON.parse(raw));
    if (result.success) {
      return result.data;
    }
    logger.warn(`Ignoring invalid config at ${file}`, { issues: result.error.issues.length });
  } catch (error) {
    logger.warn(`Failed to read ${file}, using defaults`, { error: String(error) });
  }
  return defaultConfig();
}

export function saveConfig(config: ReplicantConfig): void {
  mkdirSync(configDir(), { recursive: true });
  config.lastUsed = new Date().toISOString();
  writeFileAtomic.sync(configPath(), JSON.stringify(config, null, 2), { mode: 0o600 });
}

export function getActiveProvider(): AIProvider {
  return loadConfig().provider;
}

export function setActiveProvider(provider: AIProvider): void {
  const config = loadConfig();
  config.provider = provider;
  saveConfig(config);
}

const ENV_KEYS: Record<AIProvider, string> = {
  anthropic: 'ANTHROPIC_API_KEY',
  openai: 'OPENAI_API_KEY',
  google: 'GOOGLE_API_KEY',
  xai: 'XAI_API_KEY',
};

// Get API key for a specific provider
export function getProviderApiKey(provider: AIProvider): string | undefined {
  // Check env var first
  const envKey = process.env[ENV_KEYS[provider]];
  if (envKey) return envKey;

  // Then check config
  const config = loadConfig();
  switch (provider) {
    case 'anthropic': return config.anthropicApiKey;
    case 'openai': return config.openaiApiKey;
    case 'google': return config.googleApiKey;
    case 'xai': return config.xaiApiKey;
  }
}

export function hasApiKey(provider: AIProvider = getActiveProvider()): boolean {
  return !!getProviderApiKey(provider);
}

// Set API key for a specific provider
export function setProviderApiKey(provider: AIProvider, apiKey: string): void {
  const config = loadConfig();
  switch (provider) {
    case 'anthropic': config.anthropicApiKey = apiKey; break;
    case 'openai': config.openaiApiKey = apiKey; break;
    case 'google': config.googleApiKey = apiKey; break;
    case 'xai': config.xaiApiKey = apiKey; break;
  }
  saveConfig(config);
}

// Validate API key format
export function validateApiKey(provider: AIProvider, key: string): boolean {
  switch (provider) {
    case 'anthropic':
      return key.startsWith('sk-ant-');
    case 'openai':
      return key.startsWith('sk-') && !key.startsWith('sk-ant-');
    case 'google':
      return key.startsWith('AIza');
    case 'xai':
      return key.startsWith('xai-');
  }
}

export function isAIProvider(value: string): value is AIProvider {
  return AI_PROVIDERS.some(provider => provider === value);
}

// ============================================================================
// RUNTIME SETTINGS (environment)
// ============================================================================

const SettingsSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(8000),
  DATABASE_URL: z.string().min(1).default('file:replicant.db'),
  DATABASE_AUTH_TOKEN: z.string().min(1).optional(),
  ADMIN_TOKEN: z.string().min(1).optional(),
  GENERATION_TIMEOUT_MS: z.coerce.number().int().positive().default(60000),
  REDDIT_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  CORS_ORIGIN: z.string().min(1).default('*'),
  EVALUATE_ROUNDS: z.enum(['true', 'false', '1', '0']).default('true'),
});

export interface RuntimeSettings {
  port: number;
  databaseUrl: string;
  databaseAuthToken?: string;
  adminToken?: string;
  generationTimeoutMs: number;
  redditTimeoutMs: number;
  /** Browser origins allowed to call the API; ['*'] allows any */
  corsOrigins: string[];
  /** Score each new round with the judge model */
  evaluateRounds: boolean;
}

export function loadSettings(env: Record<string, string | undefined> = process.env): RuntimeSettings {
  // Treat empty variables as unset
  const present = Object.fromEntries(
    Object.keys(SettingsSchema.shape)
      .map(key => [key, env[key]] as const)
      .filter(([, value]) => value !== undefined && value !== '')
  );

  const result = SettingsSchema.safeParse(present);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ValidationError(`Invalid setting ${issue.path.join('.')}: ${issue.message}`);
  }

  const s = result.data;
  return {
    port: s.PORT,
    databaseUrl: s.DATABASE_URL,
    databaseAuthToken: s.DATABASE_AUTH_TOKEN,
    adminToken: s.ADMIN_TOKEN,
    generationTimeoutMs: s.GENERATION_TIMEOUT_MS,
    redditTimeoutMs: s.REDDIT_TIMEOUT_MS,
    corsOrigins: s.CORS_ORIGIN.split(',').map(origin => origin.trim()).filter(Boolean),
    evaluateRounds: s.EVALUATE_ROUNDS === 'true' || s.EVALUATE_ROUNDS === '1',
  };
}
