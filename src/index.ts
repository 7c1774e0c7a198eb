#!/usr/bin/env node
import fs from 'fs';
import path from 'path';
import { env } from './config/env.js';
import { AppError } from './errors.js';
import { createOrchestrator } from './pipeline/createOrchestrator.js';

interface CliArgs {
  url: string;
  cv?: string;
  position?: string;
  notes?: string;
}

function parseArgs(argv: string[]): CliArgs | null {
  const get = (flag: string): string | undefined => {
    const i = argv.indexOf(flag);
    return i !== -1 ? argv[i + 1] : undefined;
  };

  const url = get('--url');
  if (!url) return null;
  return { url, cv: get('--cv'), position: get('--position'), notes: get('--notes') };
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  if (!args) {
    console.error('Usage: npx tsx src/index.ts --url <company-url> [--cv <cv.pdf|cv.docx|cv.txt>] [--position <title>] [--notes <text>]');
    process.exit(1);
  }

  const orchestrator = createOrchestrator(env);

  console.log('\nJobPost Helper\n');
  console.log(`Company: ${args.url}`);
  console.log(`Model:   ${env.LLM_MODEL} @ ${env.LLM_BASE_URL}`);
  console.log('');

  if (args.cv) {
    const cvPath = path.resolve(args.cv);
    process.stdout.write('Reading CV...      ');
    const profile = await orchestrator.uploadCv({ bytes: fs.readFileSync(cvPath), fileName: path.basename(cvPath) });
    console.log(`done (${profile.name ?? 'name not found'}, ${profile.extracted_skills.length} skills)`);
  }

  process.stdout.write('Generating...      ');
  const result = await orchestrator.generate({
    company_url: args.url,
    position_title: args.position ?? null,
    notes: args.notes ?? null,
  });
  console.log('done\n');

  console.log(`Company:  ${result.company_profile.name}`);
  console.log(`Position: ${result.position_title}`);
  console.log('─'.repeat(50));
  console.log(result.cover_letter_short);
  console.log('─'.repeat(50));
  console.log(`Saved to: ${result.output_dir}\n`);
}

main().catch((err) => {
  const stage = err instanceof AppError && err.stage ? ` [${err.stage}]` : '';
  console.error(`\nError${stage}:`, err instanceof Error ? err.message : err);
  process.exit(1);
});
