import { describe, expect, it } from 'vitest';
import { defaultConfig } from '../../config/userConfig.js';
import { checkArtifact, cleanCompletion, countWords, findPlaceholders } from '../artifactChecks.js';
import { words } from '../../__tests__/fixtures.js';

const pattern = defaultConfig().placeholder_pattern;
const bounds = { min_words: 5, max_words: 10 };

describe('countWords', () => {
  it('counts whitespace-separated tokens', () => {
    expect(countWords('  one two\nthree\tfour ')).toBe(4);
    expect(countWords('   ')).toBe(0);
  });
});

describe('cleanCompletion', () => {
  it('strips code fences, a preamble line and extra blank lines', () => {
    const raw = '```text\nHere is your cover letter:\nDear team,\n\n\n\nThanks\n```';
    expect(cleanCompletion(raw)).toBe('Dear team,\n\nThanks');
  });

  it('leaves ordinary text alone', () => {
    expect(cleanCompletion('  Hello there.  ')).toBe('Hello there.');
  });
});

describe('findPlaceholders', () => {
  it('finds bracketed template tokens once each', () => {
    const text = 'Dear [Hiring Manager], I love [Company Name] and [Company Name].';
    expect(findPlaceholders(text, pattern, 'Jane Doe')).toEqual(['[Hiring Manager]', '[Company Name]']);
  });

  it('ignores a name placeholder when the applicant name is unknown', () => {
    const text = 'Best regards, [Your Name]';
    expect(findPlaceholders(text, pattern, null)).toEqual([]);
    expect(findPlaceholders(text, pattern, 'Jane Doe')).toEqual(['[Your Name]']);
  });

  it('does not flag ordinary brackets', () => {
    expect(findPlaceholders('I used React [hooks] daily', pattern, 'Jane Doe')).toEqual([]);
  });
});

describe('checkArtifact', () => {
  const policy = { bounds, placeholderPattern: pattern, applicantName: 'Jane Doe' };

  it('accepts text within bounds', () => {
    expect(checkArtifact(words(7), policy)).toEqual([]);
  });

  it('reports length problems', () => {
    expect(checkArtifact(words(3), policy)).toEqual(['too short: 3 words, need at least 5']);
    expect(checkArtifact(words(12), policy)).toEqual(['too long: 12 words, allowed at most 10']);
  });

  it('reports placeholders', () => {
    expect(checkArtifact(`${words(6)} [Your Name]`, policy)).toEqual(['contains placeholders: [Your Name]']);
  });
});
