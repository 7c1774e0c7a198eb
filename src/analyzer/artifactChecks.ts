import type { WordBounds } from '../config/userConfig.js';

export interface CheckPolicy {
  bounds: WordBounds;
  placeholderPattern: string;
  applicantName: string | null;
}

const NAME_PLACEHOLDER = /^\[\s*(?:your\s+)?(?:full\s+)?name\s*\]$/i;
const PREAMBLE = /^(?:sure[,!.]?\s*)?(?:here(?:'s| is| are)\b[^\n]*:)\s*\n/i;

export function countWords(text: string): number {
  const trimmed = text.trim();
  return trimmed ? trimmed.split(/\s+/).length : 0;
}

/** Normalizes a raw completion into the text that gets stored. */
export function cleanCompletion(raw: string): string {
  let text = raw.trim();
  const fenced = text.match(/^```[a-z]*\n([\s\S]*?)\n?```$/i);
  if (fenced) text = fenced[1].trim();
  text = text.replace(PREAMBLE, '');
  return text.replace(/\n{3,}/g, '\n\n').trim();
}

/**
 * Bracketed template tokens left in the text. A name placeholder only counts
 * when the applicant's name is known, since there is nothing to fill it with
 * otherwise.
 */
export function findPlaceholders(text: string, pattern: string, applicantName: string | null): string[] {
  const found = text.match(new RegExp(pattern, 'gi')) ?? [];
  const unique = [...new Set(found)];
  return applicantName ? unique : unique.filter((token) => !NAME_PLACEHOLDER.test(token));
}

export function checkArtifact(text: string, policy: CheckPolicy): string[] {
  const problems: string[] = [];
  const words = countWords(text);
  if (words < policy.bounds.min_words) {
    problems.push(`too short: ${words} words, need at least ${policy.bounds.min_words}`);
  } else if (words > policy.bounds.max_words) {
    problems.push(`too long: ${words} words, allowed at most ${policy.bounds.max_words}`);
  }
  const placeholders = findPlaceholders(text, policy.placeholderPattern, policy.applicantName);
  if (placeholders.length > 0) {
    problems.push(`contains placeholders: ${placeholders.join(', ')}`);
  }
  return problems;
}
