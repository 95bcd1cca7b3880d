import { describe, expect, it } from 'vitest';
import {
  KeywordMatcher,
  classificationText,
  contextValues,
  significantTokens,
  tokenizeText,
} from '../keywords.js';

describe('tokenizeText', () => {
  it('should lower-case and split on non-alphanumerics', () => {
    expect(tokenizeText('Add a READ-ONLY report_endpoint!')).toEqual(['add', 'a', 'read', 'only', 'report', 'endpoint']);
  });
});

describe('context helpers', () => {
  it('should read single values and lists', () => {
    const context = { tech_stack: ['python', 'fastapi'], file_path: 'api/reports.py' };

    expect(contextValues(context, 'tech_stack')).toEqual(['python', 'fastapi']);
    expect(contextValues(context, 'file_path')).toEqual(['api/reports.py']);
    expect(contextValues(context, 'domain')).toEqual([]);
  });

  it('should append text hints to the task', () => {
    expect(classificationText('Fix login', { tech_stack: ['react'], domain: 'retail', other: 'ignored' }))
      .toBe('Fix login react retail');
  });
});

describe('KeywordMatcher', () => {
  it('should match whole words and phrases across separators', () => {
    const matcher = new KeywordMatcher('Add a read_only API for the react-native app');

    expect(matcher.matches('read only')).toBe(true);
    expect(matcher.matches('react native')).toBe(true);
    expect(matcher.matches('api')).toBe(true);
    expect(matcher.matches('app store')).toBe(false);
  });

  it('should not match inside longer words', () => {
    const matcher = new KeywordMatcher('rapid prototyping');

    expect(matcher.matches('api')).toBe(false);
  });

  it('should count distinct keywords and ignore empty ones', () => {
    const matcher = new KeywordMatcher('api api endpoint');

    expect(matcher.count(['api', 'api', 'endpoint', 'rest'])).toBe(2);
    expect(matcher.matches('--')).toBe(false);
  });
});

describe('significantTokens', () => {
  it('should drop short words and stopwords and keep first-appearance order', () => {
    expect(significantTokens('Use JWT for the login API, then JWT again', ['use', 'the', 'then']))
      .toEqual(['jwt', 'for', 'login', 'api', 'again']);
  });
});
