/**
 * @fileoverview Shared command plumbing: parsed options, task context and
 * orchestrator construction.
 */

import * as path from 'path';
import { createOrchestrator } from '../orchestrator/bootstrap.js';
import type { OrchestrationFacade, TaskRequestOptions } from '../orchestrator/orchestration_facade.js';
import type { TaskContext } from '../types.js';
import { createError } from './errors.js';

export interface CliFlags {
  tech?: string;
  file?: string;
  projectType?: string;
  domain?: string;
  /** Project directory to analyse for context hints. */
  project?: string;
  k?: string;
  category?: string;
  answer: boolean;
  probe: boolean;
  rebuild: boolean;
}

export interface CommandInput {
  cwd: string;
  configPath?: string;
  json: boolean;
  verbose: boolean;
  /** Positionals after the command name. */
  args: string[];
  flags: CliFlags;
}

export interface OpenOptions {
  /** Refresh the knowledge index once before the command runs. */
  refresh?: boolean;
}

export async function openOrchestrator(input: CommandInput, options: OpenOptions = {}): Promise<OrchestrationFacade> {
  return createOrchestrator({
    configPath: input.configPath,
    cwd: input.cwd,
    initialRefresh: options.refresh ?? false,
  });
}

/** The free-text argument of select/plan/orchestrate/query. */
export function requireText(input: CommandInput, what: string, usage: string): string {
  const text = input.args.join(' ').trim();
  if (!text) {
    throw createError('INVALID_ARGUMENT', `Missing ${what}. Usage: ${usage}`);
  }
  return text;
}

export function parseTaskContext(flags: CliFlags): TaskContext {
  const context: Record<string, string | string[]> = {};
  if (flags.tech) {
    const stack = flags.tech.split(',').map((entry) => entry.trim()).filter(Boolean);
    if (stack.length > 0) context.tech_stack = stack;
  }
  if (flags.file) context.file_path = flags.file;
  if (flags.projectType) context.project_type = flags.projectType;
  if (flags.domain) context.domain = flags.domain;
  return context;
}

export function taskRequestOptions(input: CommandInput): TaskRequestOptions {
  return input.flags.project ? { projectDir: path.resolve(input.cwd, input.flags.project) } : {};
}

export function parsePositiveInt(value: string | undefined, flag: string): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed < 1 || String(parsed) !== value.trim()) {
    throw createError('INVALID_ARGUMENT', `${flag} must be a positive integer, got "${value}"`);
  }
  return parsed;
}

/** Run `fn` and stop the orchestrator afterwards. */
export async function withOrchestrator<T>(
  input: CommandInput,
  options: OpenOptions,
  fn: (orchestrator: OrchestrationFacade) => Promise<T>,
): Promise<T> {
  const orchestrator = await openOrchestrator(input, options);
  try {
    return await fn(orchestrator);
  } finally {
    await orchestrator.stop();
  }
}
