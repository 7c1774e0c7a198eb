import type { ArtifactKind, UserConfig } from '../config/userConfig.js';
import { AppError, GenerationError, errorMessage } from '../errors.js';
import { logger } from '../log/logger.js';
import type { CvProfile, GeneratedContent } from '../types.js';
import { attempt } from './attempt.js';
import type { AttemptOutcome } from './attempt.js';
import { checkArtifact, cleanCompletion } from './artifactChecks.js';
import type { LlmClient } from './llmClient.js';
import {
  buildLinkedinMessagePrompt,
  buildMediumCoverLetterPrompt,
  buildShortCoverLetterPrompt,
  withRevisionRequest,
} from './prompts.js';
import type { ContentContext } from './prompts.js';

export interface ContentInput {
  cvProfile: CvProfile;
  companyName: string;
  companySummary: string;
  positionTitle: string;
  notes: string | null;
}

export type GenerationPolicy = Pick<UserConfig, 'artifacts' | 'placeholder_pattern'>;

const PROMPT_BUILDERS: Record<ArtifactKind, typeof buildShortCoverLetterPrompt> = {
  cover_letter_short: buildShortCoverLetterPrompt,
  cover_letter_medium: buildMediumCoverLetterPrompt,
  linkedin_message: buildLinkedinMessagePrompt,
};

// Generation order; also the order of the LLM calls
const ARTIFACTS: ArtifactKind[] = ['cover_letter_short', 'cover_letter_medium', 'linkedin_message'];

async function generateArtifact(
  llm: LlmClient,
  kind: ArtifactKind,
  ctx: ContentContext,
  policy: GenerationPolicy,
): Promise<string> {
  const bounds = policy.artifacts[kind];
  const prompt = PROMPT_BUILDERS[kind](ctx, bounds);
  const checkPolicy = { bounds, placeholderPattern: policy.placeholder_pattern, applicantName: ctx.cv.name };

  let outcome: AttemptOutcome<string>;
  try {
    outcome = await attempt<string>(
      async (previous) => {
        const text = previous ? withRevisionRequest(prompt, previous.value, previous.problems) : prompt;
        return cleanCompletion(await llm.complete(text, { temperature: 0.7 }));
      },
      { maxAttempts: 2, check: (text) => checkArtifact(text, checkPolicy) },
    );
  } catch (err) {
    if (err instanceof AppError) throw err;
    throw new GenerationError(`Generating ${kind} failed: ${errorMessage(err)}`, { cause: err });
  }

  if (!outcome.accepted) {
    logger.warn({ artifact: kind, problems: outcome.problems }, 'Artifact kept despite failed checks');
  }
  if (!outcome.value) {
    throw new GenerationError(`Model returned an empty ${kind.replace(/_/g, ' ')}`);
  }
  return outcome.value;
}

export async function generateContent(
  llm: LlmClient,
  input: ContentInput,
  policy: GenerationPolicy,
): Promise<GeneratedContent> {
  const ctx: ContentContext = {
    cv: input.cvProfile,
    companyName: input.companyName,
    companySummary: input.companySummary,
    position: input.positionTitle,
    notes: input.notes,
  };

  const content: GeneratedContent = { cover_letter_short: '', cover_letter_medium: '', linkedin_message: '' };
  for (const kind of ARTIFACTS) {
    content[kind] = await generateArtifact(llm, kind, ctx, policy);
  }
  return content;
}
