export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export const ok = <T>(value: T): { ok: true; value: T } => ({ ok: true, value });
export const err = <E>(error: E): { ok: false; error: E } => ({ ok: false, error });

export type DocumentFormat = 'pdf' | 'docx' | 'text';

export interface CvProfile {
  name: string | null;
  raw_text: string;
  extracted_skills: readonly string[];
  extracted_experience: readonly string[];
}

export interface StoredCv {
  profile: CvProfile;
  file_name: string;
  uploaded_at: string;
}

export interface CompanyPage {
  url: string;
  scheme: 'http' | 'https';
  title: string | null;
  description: string | null;
  text: string;
}

export interface CompanyProfile {
  url: string;
  name: string;
  title: string | null;
  description: string | null;
  raw_text: string;
  summary: string;
}

export interface GenerationRequest {
  company_url: string;
  position_title: string | null;
  notes: string | null;
}

export interface GeneratedContent {
  cover_letter_short: string;
  cover_letter_medium: string;
  linkedin_message: string;
}

export interface GenerationResult extends GeneratedContent {
  company_profile: CompanyProfile;
  position_title: string;
  output_dir: string;
}
