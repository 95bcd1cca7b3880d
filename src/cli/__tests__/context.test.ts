import { describe, expect, it } from 'vitest';
import { CliError } from '../errors.js';
import {
  parsePositiveInt,
  parseTaskContext,
  requireText,
  taskRequestOptions,
  type CliFlags,
  type CommandInput,
} from '../context.js';

const NO_FLAGS: CliFlags = { answer: false, probe: false, rebuild: false };

function input(args: string[]): CommandInput {
  return { cwd: '/tmp', json: false, verbose: false, args, flags: NO_FLAGS };
}

describe('requireText', () => {
  it('should join the positionals', () => {
    expect(requireText(input(['Add', 'an', 'endpoint']), 'task', 'usage')).toBe('Add an endpoint');
  });

  it('should reject missing text', () => {
    expect(() => requireText(input(['  ']), 'task', 'ruleweaver select "<task>"'))
      .toThrow('Missing task. Usage: ruleweaver select "<task>"');
  });
});

describe('parseTaskContext', () => {
  it('should map flags onto context keys', () => {
    expect(parseTaskContext({
      ...NO_FLAGS,
      tech: 'python, fastapi,,',
      file: 'api/reports.py',
      projectType: 'api_microservices',
      domain: 'finance',
    })).toEqual({
      tech_stack: ['python', 'fastapi'],
      file_path: 'api/reports.py',
      project_type: 'api_microservices',
      domain: 'finance',
    });
  });

  it('should leave out empty flags', () => {
    expect(parseTaskContext({ ...NO_FLAGS, tech: ' , ' })).toEqual({});
  });
});

describe('taskRequestOptions', () => {
  it('should resolve the project directory against the working directory', () => {
    expect(taskRequestOptions({ ...input([]), flags: { ...NO_FLAGS, project: 'service' } }))
      .toEqual({ projectDir: '/tmp/service' });
  });

  it('should leave the project out when no flag is given', () => {
    expect(taskRequestOptions(input([]))).toEqual({});
  });
});

describe('parsePositiveInt', () => {
  it('should parse positive integers', () => {
    expect(parsePositiveInt('3', '--k')).toBe(3);
    expect(parsePositiveInt(undefined, '--k')).toBeUndefined();
  });

  it.each(['0', '-1', '2.5', 'abc', '3x'])('should reject %s', (value) => {
    expect(() => parsePositiveInt(value, '--k')).toThrow(CliError);
  });
});
