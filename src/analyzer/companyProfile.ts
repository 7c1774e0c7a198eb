import { AppError, GenerationError, errorMessage } from '../errors.js';
import type { LlmClient } from './llmClient.js';
import { cleanCompletion } from './artifactChecks.js';
import { buildCompanyAnalysisPrompt } from './prompts.js';

export const DEFAULT_COMPANY_TEXT_MAX_CHARS = 6000;

export function truncateText(text: string, maxChars: number): string {
  if (text.length <= maxChars) return text;
  const cut = text.slice(0, maxChars);
  const lastSpace = cut.lastIndexOf(' ');
  // Avoid ending mid-word unless that would drop most of the text
  return lastSpace > maxChars * 0.8 ? cut.slice(0, lastSpace) : cut;
}

/** Display name for a company: the first segment of the page title, else the bare hostname. */
export function deriveCompanyName(title: string | null, url: string): string {
  const fromTitle = title?.split(/\s[|·–—-]\s|\|/)[0].trim();
  if (fromTitle) return fromTitle;
  try {
    return new URL(url).hostname.replace(/^www\./, '');
  } catch {
    return url;
  }
}

export async function buildCompanySummary(
  llm: LlmClient,
  companyText: string,
  title: string | null,
  url: string,
  maxChars = DEFAULT_COMPANY_TEXT_MAX_CHARS,
): Promise<string> {
  const prompt = buildCompanyAnalysisPrompt(truncateText(companyText, maxChars), title, url);

  let reply: string;
  try {
    reply = await llm.complete(prompt, { temperature: 0.2 });
  } catch (err) {
    if (err instanceof AppError) throw err;
    throw new GenerationError(`Company analysis failed: ${errorMessage(err)}`, { cause: err });
  }

  const summary = cleanCompletion(reply);
  if (!summary) throw new GenerationError('Company analysis returned an empty summary');
  return summary;
}
