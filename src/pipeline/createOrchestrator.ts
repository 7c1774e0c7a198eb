import type { Env } from '../config/env.js';
import { loadConfig } from '../config/userConfig.js';
import { CvStore } from '../cv/cvStore.js';
import { AnthropicLlmClient } from '../analyzer/llmClient.js';
import { createCompanyFetcher } from '../parsers/companyFetcher.js';
import { createOutputWriter } from '../report/outputWriter.js';
import { Orchestrator } from './orchestrator.js';

/** Wires the production collaborators from environment settings. */
export function createOrchestrator(env: Env): Orchestrator {
  return new Orchestrator({
    llm: new AnthropicLlmClient({
      baseURL: env.LLM_BASE_URL,
      apiKey: env.LLM_API_KEY,
      model: env.LLM_MODEL,
      timeoutMs: env.LLM_TIMEOUT_MS,
      maxTokens: env.LLM_MAX_TOKENS,
    }),
    fetchCompany: createCompanyFetcher({ timeoutMs: env.FETCH_TIMEOUT_MS }),
    writeOutput: createOutputWriter({ rootDir: env.OUTPUT_DIR }),
    cvStore: new CvStore(),
    config: loadConfig(env.CONFIG_PATH),
    companyTextMaxChars: env.COMPANY_TEXT_MAX_CHARS,
  });
}
