import { z } from 'zod';
import { errorMessage } from '../errors.js';
import { logger } from '../log/logger.js';
import { err, ok } from '../types.js';
import type { CvProfile, Result } from '../types.js';
import { attempt } from './attempt.js';
import type { LlmClient } from './llmClient.js';
import { buildCvExtractionPrompt, buildCvReformatPrompt } from './prompts.js';

export interface CvFields {
  name: string | null;
  skills: string[];
  experience: string[];
}

export interface ParseError {
  kind: 'empty' | 'llm' | 'unparseable';
  message: string;
}

const cleanList = z
  .array(z.unknown())
  .catch([])
  .transform((items) => {
    const strings = items
      .filter((item): item is string | number => typeof item === 'string' || typeof item === 'number')
      .map((item) => String(item).replace(/\s+/g, ' ').trim())
      .filter((item) => item.length > 0);
    return [...new Set(strings)];
  });

const CvFieldsSchema = z.object({
  name: z
    .string()
    .nullish()
    .catch(null)
    .transform((name) => {
      const trimmed = name?.replace(/\s+/g, ' ').trim() ?? '';
      return trimmed && trimmed.toLowerCase() !== 'null' ? trimmed : null;
    }),
  skills: cleanList.default([]),
  experience: cleanList.default([]),
});

export const EMPTY_CV_FIELDS: CvFields = { name: null, skills: [], experience: [] };

/** Pulls the outermost JSON object out of a model reply, tolerating code fences and chatter. */
export function parseCvFields(reply: string): CvFields | null {
  const unfenced = reply.replace(/```(?:json)?/gi, '');
  const start = unfenced.indexOf('{');
  const end = unfenced.lastIndexOf('}');
  if (start === -1 || end <= start) return null;

  let data: unknown;
  try {
    data = JSON.parse(unfenced.slice(start, end + 1));
  } catch {
    return null;
  }
  const parsed = CvFieldsSchema.safeParse(data);
  return parsed.success ? parsed.data : null;
}

/**
 * Asks the model for the structured CV record, with one reformat request when
 * the first reply does not parse.
 */
export async function extractCvFields(
  llm: LlmClient,
  cvText: string,
  maxChars = 12_000,
): Promise<Result<CvFields, ParseError>> {
  const text = cvText.trim();
  if (!text) return err<ParseError>({ kind: 'empty', message: 'CV text is empty' });

  try {
    const outcome = await attempt<string>(
      (previous) =>
        llm.complete(
          previous ? buildCvReformatPrompt(previous.value) : buildCvExtractionPrompt(text.slice(0, maxChars)),
          { temperature: 0 },
        ),
      { maxAttempts: 2, check: (reply) => (parseCvFields(reply) ? [] : ['reply is not a CV JSON object']) },
    );
    const fields = parseCvFields(outcome.value);
    if (!fields) {
      return err<ParseError>({ kind: 'unparseable', message: `No usable JSON after ${outcome.attempts} attempts` });
    }
    return ok(fields);
  } catch (e) {
    return err<ParseError>({ kind: 'llm', message: errorMessage(e) });
  }
}

export async function buildCvProfile(llm: LlmClient, cvText: string, maxChars?: number): Promise<CvProfile> {
  const result = await extractCvFields(llm, cvText, maxChars);
  // Extraction is best effort: a failed parse still yields a usable profile
  const fields = result.ok ? result.value : EMPTY_CV_FIELDS;
  if (!result.ok) {
    logger.warn({ kind: result.error.kind, reason: result.error.message }, 'CV extraction fell back to defaults');
  }
  return {
    name: fields.name,
    raw_text: cvText,
    extracted_skills: [...fields.skills],
    extracted_experience: [...fields.experience],
  };
}
