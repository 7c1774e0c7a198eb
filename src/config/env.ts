import 'dotenv/config';
import { z } from 'zod';

const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().positive().default(3000),

  // Local model server speaking the Anthropic Messages API (Ollama by default)
  LLM_BASE_URL: z.string().url().default('http://localhost:11434'),
  LLM_API_KEY: z.string().min(1).default('ollama'),
  LLM_MODEL: z.string().min(1).default('mistral-small'),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(120_000),
  LLM_MAX_TOKENS: z.coerce.number().int().positive().default(2048),

  FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  COMPANY_TEXT_MAX_CHARS: z.coerce.number().int().positive().default(6000),

  OUTPUT_DIR: z.string().min(1).default('output'),
  CONFIG_PATH: z.string().min(1).default('jobpost.config.json'),
});

export type Env = z.infer<typeof EnvSchema>;

export function parseEnv(source: NodeJS.ProcessEnv): Env {
  return EnvSchema.parse(source);
}

export const env: Env = parseEnv(process.env);
