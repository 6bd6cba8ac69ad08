import { z } from 'zod';
import type { SessionConfig } from './pipeline/types.js';

const flag = z
  .string()
  .trim()
  .toLowerCase()
  .transform((v) => ['true', '1', 'yes', 'on'].includes(v));

const positiveInt = z.coerce.number().int().positive();

const envSchema = z.object({
  // Web search / page fetch
  MAX_RESULTS: positiveInt.default(5),
  REQUEST_TIMEOUT_MS: positiveInt.default(4000),
  MAX_LEN_PER_SOURCE: positiveInt.default(20_000),
  EXTRACT_CONCURRENCY: positiveInt.default(1),

  // Ollama (use 127.0.0.1 instead of localhost for IPv4/IPv6 compatibility)
  OLLAMA_URL: z.string().url().default('http://127.0.0.1:11434'),
  OLLAMA_MODEL: z.string().min(1).default('deepseek-r1:1.5b'),
  OLLAMA_TIMEOUT_MS: positiveInt.default(120_000),
  OLLAMA_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.3),
  OLLAMA_NUM_PREDICT: positiveInt.default(2048),

  // Conversation history
  MAX_HISTORY_TURNS: positiveInt.default(3),
  HISTORY_ENABLED: flag.default('true'),
});

export type EnvConfig = z.infer<typeof envSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig & { USER_AGENT: string } {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid configuration: ${issues}`);
  }
  return {
    ...parsed.data,
    USER_AGENT:
      'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
  };
}

export const config = loadConfig();

export function getGenerateUrl(): string {
  return `${config.OLLAMA_URL.replace(/\/+$/, '')}/api/generate`;
}

export function getSessionConfig(): SessionConfig {
  return {
    maxResults: config.MAX_RESULTS,
    historyDepth: config.MAX_HISTORY_TURNS,
    historyEnabled: config.HISTORY_ENABLED,
    extractConcurrency: config.EXTRACT_CONCURRENCY,
  };
}
