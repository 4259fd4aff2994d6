/**
 * Settings from the environment
 *
 * The entry point loads .env through dotenv; everything here reads an
 * explicit env record so tests can pass their own.
 */

import { mkdir } from 'fs/promises';
import { join } from 'path';
import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import { ConfigError } from './errors.js';
import { LLM_PROVIDERS, type LlmConfig } from './types.js';

const FlagSchema = Type.Union([Type.Literal('0'), Type.Literal('1'), Type.Literal('true'), Type.Literal('false')]);
const ProviderSchema = Type.Union(LLM_PROVIDERS.map((provider) => Type.Literal(provider)));
const NumberSchema = Type.String({ pattern: '^\\d+(\\.\\d+)?$' });
const IntegerSchema = Type.String({ pattern: '^\\d+$' });

export const EnvSchema = Type.Object({
  LOOMCHAT_DATA_DIR: Type.Optional(Type.String({ minLength: 1 })),
  LOOMCHAT_NO_SAVE_CHAT: Type.Optional(FlagSchema),
  LOOMCHAT_AUTO_NAME_SESSION: Type.Optional(FlagSchema),
  LOOMCHAT_AUTO_NAME_PROVIDER: Type.Optional(ProviderSchema),
  LOOMCHAT_AUTO_NAME_MODEL: Type.Optional(Type.String()),
  LOOMCHAT_PROVIDER: Type.Optional(ProviderSchema),
  LOOMCHAT_MODEL: Type.Optional(Type.String()),
  LOOMCHAT_TEMPERATURE: Type.Optional(NumberSchema),
  LOOMCHAT_BASE_URL: Type.Optional(Type.String()),
  LOOMCHAT_API_KEY: Type.Optional(Type.String()),
  LOOMCHAT_STREAM_TIMEOUT_MS: Type.Optional(IntegerSchema),
});
export type LoomchatEnv = Static<typeof EnvSchema>;

export const DEFAULT_DATA_DIR = '.loomchat';
export const DEFAULT_MODEL = 'llama3.2';
export const DEFAULT_TEMPERATURE = 0.5;
export const DEFAULT_STREAM_TIMEOUT_MS = 120_000;

export interface ChatSettings {
  dataDir: string;
  chatDir: string;
  promptDir: string;
  exportDir: string;
  /** Keep sessions in memory only */
  noSaveChat: boolean;
  autoNameSession: boolean;
  /** Secondary model used to name sessions; auto-naming needs it */
  autoNameLlmConfig?: LlmConfig;
  defaultLlmConfig: LlmConfig;
  streamTimeoutMs: number;
}

function isSet(flag: string | undefined): boolean {
  return flag === '1' || flag === 'true';
}

/**
 * Read and validate settings
 */
export function loadSettings(env: Record<string, string | undefined> = process.env): ChatSettings {
  // Empty variables count as unset
  const defined: unknown = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ''));
  if (!Value.Check(EnvSchema, defined)) {
    const problems = [...Value.Errors(EnvSchema, defined)].map((e) => `${e.path.slice(1)}: ${e.message}`);
    throw new ConfigError('Invalid configuration', problems);
  }

  const dataDir = defined.LOOMCHAT_DATA_DIR ?? DEFAULT_DATA_DIR;
  const defaultLlmConfig: LlmConfig = {
    provider: defined.LOOMCHAT_PROVIDER ?? 'ollama',
    modelName: defined.LOOMCHAT_MODEL ?? DEFAULT_MODEL,
    temperature: defined.LOOMCHAT_TEMPERATURE ? Number(defined.LOOMCHAT_TEMPERATURE) : DEFAULT_TEMPERATURE,
    baseUrl: defined.LOOMCHAT_BASE_URL,
    apiKey: defined.LOOMCHAT_API_KEY,
  };

  const autoNameModel = defined.LOOMCHAT_AUTO_NAME_MODEL?.trim();
  const autoNameProvider = defined.LOOMCHAT_AUTO_NAME_PROVIDER ?? defaultLlmConfig.provider;
  const autoNameLlmConfig: LlmConfig | undefined = autoNameModel
    ? {
        provider: autoNameProvider,
        modelName: autoNameModel,
        temperature: DEFAULT_TEMPERATURE,
        // the default endpoint only applies when both use the same provider
        baseUrl: autoNameProvider === defaultLlmConfig.provider ? defaultLlmConfig.baseUrl : undefined,
        apiKey: autoNameProvider === defaultLlmConfig.provider ? defaultLlmConfig.apiKey : undefined,
      }
    : undefined;

  return {
    dataDir,
    chatDir: join(dataDir, 'chats'),
    promptDir: join(dataDir, 'prompts'),
    exportDir: join(dataDir, 'md_exports'),
    noSaveChat: isSet(defined.LOOMCHAT_NO_SAVE_CHAT),
    autoNameSession: isSet(defined.LOOMCHAT_AUTO_NAME_SESSION),
    autoNameLlmConfig,
    defaultLlmConfig,
    streamTimeoutMs: defined.LOOMCHAT_STREAM_TIMEOUT_MS
      ? Number(defined.LOOMCHAT_STREAM_TIMEOUT_MS)
      : DEFAULT_STREAM_TIMEOUT_MS,
  };
}

export async function ensureDataDirs(settings: ChatSettings): Promise<void> {
  for (const dir of [settings.chatDir, settings.promptDir, settings.exportDir]) {
    await mkdir(dir, { recursive: true });
  }
}
