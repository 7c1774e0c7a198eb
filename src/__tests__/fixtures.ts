import { vi } from 'vitest';
import type { Mock } from 'vitest';
import type { CompletionOptions, LlmClient } from '../analyzer/llmClient.js';
import { defaultConfig } from '../config/userConfig.js';
import type { UserConfig } from '../config/userConfig.js';

export function words(count: number, word = 'word'): string {
  return Array.from({ length: count }, () => word).join(' ');
}

export const SHORT_LETTER = `I would love to join Example Corp. ${words(50, 'skill')}`;
export const MEDIUM_LETTER = `Dear team at Example Corp. ${words(120, 'detail')}`;
export const LINKEDIN_MESSAGE = `Hi! CV attached. ${words(40, 'hello')}`;
export const COMPANY_SUMMARY = 'Example Corp builds developer tools for small teams.';

export type Responder = (prompt: string, options?: CompletionOptions) => string | Promise<string>;

export interface StubLlm extends LlmClient {
  prompts: string[];
  complete: Mock<LlmClient['complete']>;
}

/** Default replies keyed by the first line of each prompt template. */
export const defaultResponder: Responder = (prompt) => {
  if (prompt.startsWith('You extract structured data from CVs.')) {
    return JSON.stringify({ name: 'Jane Doe', skills: ['Python', 'React'], experience: [] });
  }
  if (prompt.startsWith('You are researching a company')) return COMPANY_SUMMARY;
  if (prompt.startsWith('Write a SHORT cover letter')) return SHORT_LETTER;
  if (prompt.startsWith('Write a MEDIUM-LENGTH cover letter')) return MEDIUM_LETTER;
  if (prompt.startsWith('Write a LinkedIn message')) return LINKEDIN_MESSAGE;
  throw new Error(`Unexpected prompt: ${prompt.slice(0, 60)}`);
};

export function createStubLlm(responder: Responder = defaultResponder): StubLlm {
  const prompts: string[] = [];
  const complete = vi.fn(async (prompt: string, options?: CompletionOptions) => {
    prompts.push(prompt);
    return responder(prompt, options);
  });
  return { prompts, complete };
}

export function testConfig(overrides: Partial<UserConfig> = {}): UserConfig {
  return { ...defaultConfig(), ...overrides };
}
