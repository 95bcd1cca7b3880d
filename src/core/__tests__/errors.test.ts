import { describe, expect, it } from 'vitest';
import {
  BackendUnavailableError,
  ConfigurationError,
  IndexCorruptionError,
  InvalidClassificationError,
  NotFoundError,
  ParseError,
  RuleCatalogError,
  getErrorMessage,
  isBackendUnavailableError,
  isIndexCorruptionError,
  isNotFoundError,
  isRuleweaverError,
} from '../errors.js';

describe('RuleweaverError hierarchy', () => {
  it('should describe unknown ids with the entity kind', () => {
    const error = new NotFoundError('rule', '42_missing');

    expect(error.message).toBe('Unknown rule id: 42_missing');
    expect(error.code).toBe('NOT_FOUND');
    expect(error.retryable).toBe(false);
    expect(error.toJSON().details).toEqual({ entity: 'rule', id: '42_missing' });
    expect(error.toString()).toBe('[NOT_FOUND] Unknown rule id: 42_missing');
  });

  it('should carry classification issues', () => {
    const error = new InvalidClassificationError('complexity is missing or invalid', ['complexity: Required']);

    expect(error.message).toBe('Invalid classification: complexity is missing or invalid');
    expect(error.toJSON().details).toEqual({ issues: ['complexity: Required'] });
  });

  it('should mark only transient backend failures as retryable', () => {
    expect(new BackendUnavailableError('claude', 'timeout', 'slow').retryable).toBe(true);
    expect(new BackendUnavailableError('claude', 'execution_failed', 'exit 1').retryable).toBe(true);
    expect(new BackendUnavailableError('none', 'not_configured', 'none').retryable).toBe(false);
    expect(new BackendUnavailableError('claude', 'invalid_response', 'bad json').retryable).toBe(false);
  });

  it('should format backend failures with provider and reason', () => {
    const error = new BackendUnavailableError('codex', 'cancelled', 'caller went away');

    expect(error.message).toBe('Reasoning backend codex cancelled: caller went away');
    expect(error.toJSON().details).toEqual({ provider: 'codex', reason: 'cancelled' });
  });

  it('should name both versions in an index corruption error', () => {
    const error = new IndexCorruptionError('hashing-v1-d256', 'hashing-v1-d128', 'search');

    expect(error.message).toBe(
      'Embedding version mismatch during search: index uses hashing-v1-d256, got hashing-v1-d128. Rebuild the index.'
    );
  });

  it('should list offending rule ids in catalog errors', () => {
    const error = new RuleCatalogError('duplicate rule ids: a, b', ['a', 'b'], '/rules');

    expect(error.toJSON().details).toEqual({ ruleIds: ['a', 'b'], source: '/rules' });
  });

  it('should mention the source in parse errors when given', () => {
    expect(new ParseError('yaml', 'bad indent', 'rules.yaml').message).toBe(
      'Failed to parse yaml (rules.yaml): bad indent'
    );
    expect(new ParseError('json', 'unexpected token').message).toBe('Failed to parse json: unexpected token');
  });

  it('should narrow with the type guards', () => {
    const errors: unknown[] = [
      new NotFoundError('document', 'x'),
      new IndexCorruptionError('a', 'b', 'ingest'),
      new BackendUnavailableError('none', 'not_configured', 'none'),
      new ConfigurationError('rules.mandatory', 'unknown'),
      new Error('plain'),
    ];

    expect(errors.map(isRuleweaverError)).toEqual([true, true, true, true, false]);
    expect(errors.map(isNotFoundError)).toEqual([true, false, false, false, false]);
    expect(errors.map(isIndexCorruptionError)).toEqual([false, true, false, false, false]);
    expect(errors.map(isBackendUnavailableError)).toEqual([false, false, true, false, false]);
  });
});

describe('getErrorMessage', () => {
  it('should read messages from errors, strings and message-bearing objects', () => {
    expect(getErrorMessage(new Error('boom'))).toBe('boom');
    expect(getErrorMessage('plain')).toBe('plain');
    expect(getErrorMessage({ message: 'shaped' })).toBe('shaped');
    expect(getErrorMessage(42)).toBe('42');
  });
});
