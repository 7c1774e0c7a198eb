import fs from 'fs';
import path from 'path';
import { IOError, errorMessage } from '../errors.js';
import type { GenerationResult } from '../types.js';

export type ApplicationArtifacts = Omit<GenerationResult, 'output_dir'>;

export interface OutputWriterOptions {
  rootDir: string;
  now?: () => Date;
  writeFile?: (filePath: string, content: string) => void;
}

export type OutputWriter = (companyName: string, artifacts: ApplicationArtifacts) => string;

const pad = (n: number): string => String(n).padStart(2, '0');

export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export function sanitizeCompanyName(name: string): string {
  const slug = name
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .replace(/[^A-Za-z0-9._-]+/g, '_')
    .replace(/^[_.]+|[_.]+$/g, '')
    .slice(0, 60)
    .replace(/[_.]+$/, '');
  return slug || 'company';
}

function companyInfo(artifacts: ApplicationArtifacts, generatedAt: Date): string {
  const company = artifacts.company_profile;
  return [
    `Company: ${company.name}`,
    `URL: ${company.url}`,
    `Title: ${company.title ?? ''}`,
    `Description: ${company.description ?? ''}`,
    `Position: ${artifacts.position_title}`,
    `Generated: ${generatedAt.toISOString()}`,
    '',
    'Summary:',
    company.summary,
    '',
  ].join('\n');
}

/** Creates a fresh directory, adding a numeric suffix when the name is taken. */
function createUniqueDir(rootDir: string, baseName: string): string {
  fs.mkdirSync(rootDir, { recursive: true });
  for (let n = 1; ; n++) {
    const dir = path.join(rootDir, n === 1 ? baseName : `${baseName}_${n}`);
    try {
      fs.mkdirSync(dir);
      return dir;
    } catch (err) {
      const exists = err instanceof Error && 'code' in err && err.code === 'EEXIST';
      if (!exists) throw err;
    }
  }
}

export function createOutputWriter(options: OutputWriterOptions): OutputWriter {
  const rootDir = path.resolve(options.rootDir);
  const now = options.now ?? (() => new Date());
  const writeFile = options.writeFile ?? ((filePath: string, content: string) => fs.writeFileSync(filePath, content, 'utf-8'));

  return function writeApplication(companyName: string, artifacts: ApplicationArtifacts): string {
    const generatedAt = now();
    const baseName = `${formatTimestamp(generatedAt)}_${sanitizeCompanyName(companyName)}`;

    let dir: string;
    try {
      dir = createUniqueDir(rootDir, baseName);
    } catch (err) {
      throw new IOError(`Could not create output directory in ${rootDir}: ${errorMessage(err)}`, { cause: err });
    }

    const files: [string, string][] = [
      ['company_info.txt', companyInfo(artifacts, generatedAt)],
      ['cover_letter_short.txt', artifacts.cover_letter_short],
      ['cover_letter_medium.txt', artifacts.cover_letter_medium],
      ['linkedin_message.txt', artifacts.linkedin_message],
    ];

    try {
      for (const [name, content] of files) {
        writeFile(path.join(dir, name), content.endsWith('\n') ? content : `${content}\n`);
      }
    } catch (err) {
      fs.rmSync(dir, { recursive: true, force: true });
      throw new IOError(`Could not write to ${dir}: ${errorMessage(err)}`, { cause: err });
    }
    return dir;
  };
}
