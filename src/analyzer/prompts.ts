import type { WordBounds } from '../config/userConfig.js';
import type { CvProfile } from '../types.js';

export function buildCvExtractionPrompt(cvText: string): string {
  return `You extract structured data from CVs.

Return ONLY valid JSON with this exact structure:
{
  "name": "Full Name or null",
  "skills": ["skill", "..."],
  "experience": ["Role at Company (years)", "..."]
}

Rules:
- "name" is the applicant's full name as written in the CV; use null if it is not stated
- "skills": technologies, languages, tools and notable soft skills, one per entry, at most 30
- "experience": one short line per job, internship or significant project, most recent first, at most 10
- Do not invent anything that is not in the CV
- No markdown, no comments, no text before or after the JSON

CV:
---
${cvText}
---`;
}

export function buildCvReformatPrompt(previousReply: string): string {
  return `Your previous reply could not be parsed as JSON.

Rewrite it as a single JSON object with exactly the keys "name" (string or null), "skills" (array of strings) and "experience" (array of strings).
Output the JSON object only: no markdown fences, no explanations.

Previous reply:
---
${previousReply}
---`;
}

export function buildCompanyAnalysisPrompt(companyText: string, title: string | null, url: string): string {
  return `You are researching a company before applying for a job there. Summarize what matters for a cover letter.

Website: ${url}
Page title: ${title ?? 'unknown'}

Write a plain-text summary (120-220 words) covering:
- What the company does and who its customers are
- Products, services or projects worth mentioning
- Technologies or technical domains they work with, if visible
- Culture, values or mission statements, if visible

Stick to facts from the page text. If something is not mentioned, leave it out rather than guessing.

Page text:
---
${companyText}
---`;
}

export interface ContentContext {
  cv: CvProfile;
  companyName: string;
  companySummary: string;
  position: string;
  notes: string | null;
}

function applicantBlock(cv: CvProfile): string {
  const skills = cv.extracted_skills.length > 0 ? cv.extracted_skills.join(', ') : 'not provided';
  const experience =
    cv.extracted_experience.length > 0
      ? cv.extracted_experience.map((line) => `- ${line}`).join('\n')
      : '- not provided';
  return `Applicant name: ${cv.name ?? 'not provided'}
Skills: ${skills}
Experience:
${experience}`;
}

function sharedRules(ctx: ContentContext, bounds: WordBounds): string {
  const signOff = ctx.cv.name
    ? `- Sign off as ${ctx.cv.name}`
    : '- Sign off without a name';
  return `- Between ${bounds.min_words} and ${bounds.max_words} words
- Casual professional tone: direct, practical, honest, no flowery language
- Show genuine interest in their work using concrete details from the company summary
- Only claim skills and experience listed for the applicant
- Never use placeholders in square brackets such as [Company Name] or [Your Name]
${signOff}
- Output the message text only, with no title and no commentary`;
}

function contextBlock(ctx: ContentContext): string {
  return `Company: ${ctx.companyName}
Company summary:
${ctx.companySummary}

Position: ${ctx.position}
${ctx.notes ? `Notes from the applicant: ${ctx.notes}\n` : ''}
${applicantBlock(ctx.cv)}`;
}

export function buildShortCoverLetterPrompt(ctx: ContentContext, bounds: WordBounds): string {
  return `Write a SHORT cover letter (a single paragraph) for the application below.

${contextBlock(ctx)}

Requirements:
${sharedRules(ctx, bounds)}`;
}

export function buildMediumCoverLetterPrompt(ctx: ContentContext, bounds: WordBounds): string {
  return `Write a MEDIUM-LENGTH cover letter (about a quarter of a page, two or three paragraphs) for the application below.

${contextBlock(ctx)}

Requirements:
${sharedRules(ctx, bounds)}
- Open with why this company specifically, then connect two or three of the applicant's skills to their work
- Close by offering to talk, mentioning openness to an internship if a full role is not available`;
}

export function buildLinkedinMessagePrompt(ctx: ContentContext, bounds: WordBounds): string {
  return `Write a LinkedIn message for a spontaneous application, addressed to someone working at the company below.

${contextBlock(ctx)}

Requirements:
${sharedRules(ctx, bounds)}
- Friendly and brief; mention that the CV is attached
- Ask them to forward the profile to the relevant team`;
}

export function withRevisionRequest(prompt: string, previousDraft: string, problems: string[]): string {
  return `${prompt}

A previous draft was rejected for these reasons:
${problems.map((p) => `- ${p}`).join('\n')}

Previous draft:
---
${previousDraft}
---
Write a new version that fixes every problem listed.`;
}
