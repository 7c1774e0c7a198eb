import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { defaultConfig, loadConfig, parseConfig } from '../userConfig.js';

describe('parseConfig', () => {
  it('fills every missing field with its default', () => {
    const config = parseConfig({});

    expect(config.default_position).toBe('junior developer');
    expect(config.cv_max_chars).toBe(12_000);
    expect(config.artifacts.cover_letter_short).toEqual({ min_words: 40, max_words: 200 });
    expect(config.artifacts.linkedin_message).toEqual({ min_words: 25, max_words: 150 });
  });

  it('keeps defaults for artifacts that are not overridden', () => {
    const config = parseConfig({ artifacts: { cover_letter_medium: { min_words: 100, max_words: 300 } } });

    expect(config.artifacts.cover_letter_medium).toEqual({ min_words: 100, max_words: 300 });
    expect(config.artifacts.cover_letter_short).toEqual({ min_words: 40, max_words: 200 });
  });

  it('rejects bounds where min exceeds max', () => {
    expect(() => parseConfig({ artifacts: { linkedin_message: { min_words: 90, max_words: 30 } } })).toThrow(
      'linkedin_message: min_words must not exceed max_words',
    );
  });

  it('rejects a placeholder pattern that is not a valid regex', () => {
    expect(() => parseConfig({ placeholder_pattern: '[unclosed' })).toThrow(SyntaxError);
  });
});

describe('loadConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'jobpost-config-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('returns defaults when the file does not exist', () => {
    expect(loadConfig(path.join(dir, 'missing.json'))).toEqual(defaultConfig());
  });

  it('reads overrides from disk', () => {
    const file = path.join(dir, 'jobpost.config.json');
    fs.writeFileSync(file, JSON.stringify({ default_position: 'backend intern' }));

    expect(loadConfig(file).default_position).toBe('backend intern');
  });

  it('falls back to defaults on invalid JSON', () => {
    const file = path.join(dir, 'jobpost.config.json');
    fs.writeFileSync(file, '{ not json');

    expect(loadConfig(file)).toEqual(defaultConfig());
  });
});
