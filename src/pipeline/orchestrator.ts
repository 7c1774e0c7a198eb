import type { UserConfig } from '../config/userConfig.js';
import { toStageError } from '../errors.js';
import type { Stage } from '../errors.js';
import { logger } from '../log/logger.js';
import type { CvStore } from '../cv/cvStore.js';
import type { LlmClient } from '../analyzer/llmClient.js';
import { buildCvProfile } from '../analyzer/cvProfile.js';
import { buildCompanySummary, deriveCompanyName } from '../analyzer/companyProfile.js';
import { generateContent } from '../analyzer/contentGenerator.js';
import type { CompanyFetcher } from '../parsers/companyFetcher.js';
import { extractText, resolveFormat } from '../parsers/textExtractor.js';
import type { OutputWriter } from '../report/outputWriter.js';
import type { CompanyProfile, CvProfile, GenerationRequest, GenerationResult } from '../types.js';

export interface OrchestratorDeps {
  llm: LlmClient;
  fetchCompany: CompanyFetcher;
  writeOutput: OutputWriter;
  cvStore: CvStore;
  config: UserConfig;
  companyTextMaxChars?: number;
  onStage?: (stage: Stage, requestId: number) => void;
}

export interface CvUpload {
  bytes: Buffer;
  fileName: string;
  mimeType?: string;
}

const EMPTY_PROFILE: CvProfile = { name: null, raw_text: '', extracted_skills: [], extracted_experience: [] };

export class Orchestrator {
  private nextRequestId = 1;

  constructor(private readonly deps: OrchestratorDeps) {}

  async generate(request: GenerationRequest): Promise<GenerationResult> {
    const requestId = this.nextRequestId++;
    const log = logger.child({ requestId, url: request.company_url });
    const state: { stage: Stage } = { stage: 'received' };
    const enter = (next: Stage): void => {
      state.stage = next;
      log.debug({ stage: next }, 'Pipeline stage');
      this.deps.onStage?.(next, requestId);
    };
    enter('received');

    const position = request.position_title?.trim() || this.deps.config.default_position;
    const notes = request.notes?.trim() || null;

    try {
      enter('fetching_company');
      const page = await this.deps.fetchCompany(request.company_url);

      enter('cv_lookup');
      const cvProfile = this.deps.cvStore.get()?.profile ?? EMPTY_PROFILE;

      enter('summarizing');
      const summary = await buildCompanySummary(
        this.deps.llm,
        page.text,
        page.title,
        page.url,
        this.deps.companyTextMaxChars,
      );
      const company: CompanyProfile = {
        url: page.url,
        name: deriveCompanyName(page.title, page.url),
        title: page.title,
        description: page.description,
        raw_text: page.text,
        summary,
      };

      enter('generating');
      const content = await generateContent(
        this.deps.llm,
        { cvProfile, companyName: company.name, companySummary: summary, positionTitle: position, notes },
        this.deps.config,
      );

      enter('persisting');
      const artifacts = { company_profile: company, position_title: position, ...content };
      const outputDir = this.deps.writeOutput(company.name, artifacts);

      enter('completed');
      log.info({ company: company.name, outputDir }, 'Application content generated');
      return { ...artifacts, output_dir: outputDir };
    } catch (err) {
      const failedAt = state.stage;
      enter('failed');
      const error = toStageError(err, failedAt);
      log.warn({ stage: failedAt, code: error.code, err: error.message }, 'Pipeline failed');
      throw error;
    }
  }

  async uploadCv(upload: CvUpload): Promise<CvProfile> {
    try {
      const format = resolveFormat(upload.fileName, upload.mimeType);
      const stored = await this.deps.cvStore.replace(async () => {
        const text = await extractText(upload.bytes, format);
        const profile = await buildCvProfile(this.deps.llm, text, this.deps.config.cv_max_chars);
        return { profile, file_name: upload.fileName, uploaded_at: new Date().toISOString() };
      });
      logger.info(
        { file: upload.fileName, name: stored.profile.name, skills: stored.profile.extracted_skills.length },
        'CV uploaded',
      );
      return stored.profile;
    } catch (err) {
      throw toStageError(err, 'uploading_cv');
    }
  }

  cvStatus(): { uploaded: boolean; name: string | null } {
    const current = this.deps.cvStore.get();
    return { uploaded: current !== null, name: current?.profile.name ?? null };
  }

  deleteCv(): Promise<boolean> {
    return this.deps.cvStore.clear();
  }
}
