import express from 'express';
import type { NextFunction, Request, Response } from 'express';
import cors from 'cors';
import multer from 'multer';
import { z } from 'zod';
import { AppError, ValidationError } from './errors.js';
import { httpLogger, logger } from './log/logger.js';
import type { Orchestrator } from './pipeline/orchestrator.js';

const MAX_UPLOAD_BYTES = 10 * 1024 * 1024;

const optionalText = z
  .string()
  .max(2000)
  .nullish()
  .transform((value) => value?.trim() || null);

const GenerateBodySchema = z.object({
  company_url: z.string({ required_error: 'company_url is required' }).trim().min(1, 'company_url is required').max(2048),
  position_title: optionalText,
  notes: optionalText,
});

interface ErrorBody {
  error: string;
  code: string;
  stage: string | null;
}

function toErrorBody(err: AppError): ErrorBody {
  return {
    error: err.stage ? `${err.stage}: ${err.message}` : err.message,
    code: err.code,
    stage: err.stage,
  };
}

function normalizeError(err: unknown): AppError {
  if (err instanceof AppError) return err;
  if (err instanceof multer.MulterError) {
    const message = err.code === 'LIMIT_FILE_SIZE' ? `File exceeds ${MAX_UPLOAD_BYTES} bytes` : err.message;
    return new AppError('VALIDATION_ERROR', 400, message, { cause: err }).atStage('uploading_cv');
  }
  // body-parser marks malformed JSON with type 'entity.parse.failed'
  if (err instanceof SyntaxError && 'type' in err && err.type === 'entity.parse.failed') {
    return new ValidationError('Request body is not valid JSON');
  }
  return new AppError('INTERNAL_ERROR', 500, 'Internal server error', { cause: err });
}

export function apiErrorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  const error = normalizeError(err);
  const level = error.status >= 500 ? 'error' : 'warn';
  logger[level]({ err, code: error.code, status: error.status, path: req.path }, 'API error response');
  if (res.headersSent) return;
  res.status(error.status).json(toErrorBody(error));
}

export function createApp(orchestrator: Orchestrator): express.Express {
  const app = express();
  const upload = multer({ storage: multer.memoryStorage(), limits: { fileSize: MAX_UPLOAD_BYTES, files: 1 } });

  app.use(httpLogger);
  app.use(cors());
  app.use(express.json({ limit: '1mb' }));

  app.get('/', (_req: Request, res: Response): void => {
    res.json({ message: 'JobPost Helper is running' });
  });

  app.get('/health', (_req: Request, res: Response): void => {
    res.json({ status: 'ok' });
  });

  app.post('/upload-cv', upload.single('file'), async (req: Request, res: Response, next: NextFunction) => {
    try {
      if (!req.file) throw new ValidationError('Send the CV as multipart form field "file"');
      const profile = await orchestrator.uploadCv({
        bytes: req.file.buffer,
        fileName: req.file.originalname,
        mimeType: req.file.mimetype,
      });
      res.json({ name: profile.name, skills: profile.extracted_skills });
    } catch (err) {
      next(err);
    }
  });

  app.get('/cv-status', (_req: Request, res: Response): void => {
    res.json(orchestrator.cvStatus());
  });

  app.delete('/cv', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.json({ removed: await orchestrator.deleteCv() });
    } catch (err) {
      next(err);
    }
  });

  app.post('/generate', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const parsed = GenerateBodySchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        const issue = parsed.error.issues[0];
        throw new ValidationError(`${issue.path.join('.') || 'body'}: ${issue.message}`);
      }
      const result = await orchestrator.generate(parsed.data);
      res.json({
        company_summary: result.company_profile.summary,
        cover_letter_short: result.cover_letter_short,
        cover_letter_medium: result.cover_letter_medium,
        linkedin_message: result.linkedin_message,
        output_dir: result.output_dir,
      });
    } catch (err) {
      next(err);
    }
  });

  app.use(apiErrorHandler);
  return app;
}
