import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { logger } from '../log/logger.js';
import { errorMessage } from '../errors.js';

const WordBoundsSchema = z.object({
  min_words: z.number().int().nonnegative(),
  max_words: z.number().int().positive(),
});

const UserConfigSchema = z.object({
  // Used in prompts and company_info.txt when a request names no position
  default_position: z.string().min(1).default('junior developer'),
  cv_max_chars: z.number().int().positive().default(12_000),
  artifacts: z
    .object({
      cover_letter_short: WordBoundsSchema.default({ min_words: 40, max_words: 200 }),
      cover_letter_medium: WordBoundsSchema.default({ min_words: 90, max_words: 380 }),
      linkedin_message: WordBoundsSchema.default({ min_words: 25, max_words: 150 }),
    })
    .default({}),
  placeholder_pattern: z
    .string()
    .default('\\[(?:your|insert|company|hiring|recipient|position|job|role|date)[^\\]\\n]*\\]'),
});

export type WordBounds = z.infer<typeof WordBoundsSchema>;
export type UserConfig = z.infer<typeof UserConfigSchema>;
export type ArtifactKind = keyof UserConfig['artifacts'];

export function defaultConfig(): UserConfig {
  return UserConfigSchema.parse({});
}

export function parseConfig(raw: unknown): UserConfig {
  const config = UserConfigSchema.parse(raw);
  // fail here rather than on the first generation
  new RegExp(config.placeholder_pattern, 'gi');
  for (const [kind, bounds] of Object.entries(config.artifacts)) {
    if (bounds.min_words > bounds.max_words) {
      throw new Error(`${kind}: min_words must not exceed max_words`);
    }
  }
  return config;
}

export function loadConfig(configPath: string): UserConfig {
  const absPath = path.resolve(configPath);
  if (!fs.existsSync(absPath)) return defaultConfig();
  try {
    const raw = fs.readFileSync(absPath, 'utf-8');
    return parseConfig(JSON.parse(raw));
  } catch (err) {
    logger.warn({ path: absPath, err: errorMessage(err) }, 'Invalid config file, using defaults');
    return defaultConfig();
  }
}
