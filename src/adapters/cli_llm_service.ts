import { execa } from 'execa';
import path from 'node:path';
import { logDebug, logWarning } from '../telemetry/logger.js';
import type { BackendConfig } from '../config/schema.js';
import {
  buildInitialHealth,
  type BackendHealth,
  type LlmChatOptions,
  type LlmChatResult,
  type ReasoningBackend,
} from './llm_service.js';

export type CliProvider = 'claude' | 'codex' | 'command';

export interface CliReasoningBackendOptions {
  provider: CliProvider;
  model: string;
  /** Executable for the `command` provider. */
  command?: string;
  /** Extra arguments for the `command` provider. */
  args?: readonly string[];
  /** Arguments for the `command` provider's health probe. */
  healthArgs?: readonly string[];
  healthCheckIntervalMs: number;
  maxConcurrent: number;
}

class AsyncSemaphore {
  private active = 0;
  private queue: Array<() => void> = [];

  constructor(private max: number) {
    if (!Number.isFinite(this.max) || this.max <= 0) {
      this.max = 1;
    }
  }

  async run<T>(task: () => Promise<T>): Promise<T> {
    if (this.active >= this.max) {
      await new Promise<void>((resolve) => this.queue.push(resolve));
    }
    this.active += 1;
    try {
      return await task();
    } finally {
      this.active -= 1;
      const next = this.queue.shift();
      if (next) next();
    }
  }
}

function buildFullPrompt(messages: LlmChatOptions['messages']): string {
  const parts: string[] = [];
  for (const message of messages) {
    if (message.role === 'system') continue;
    if (message.role === 'user') {
      parts.push(message.content);
    } else {
      parts.push(`[Previous Response]\n${message.content}`);
    }
  }
  return parts.join('\n\n');
}

function extractSystemPrompt(messages: LlmChatOptions['messages']): string | null {
  const systems = messages.filter((message) => message.role === 'system');
  if (systems.length === 0) return null;
  return systems.map((message) => message.content).join('\n\n');
}

function withCliPath(env: NodeJS.ProcessEnv): NodeJS.ProcessEnv {
  const home = process.env.HOME || '';
  const prefix = home ? path.join(home, '.local', 'bin') : '';
  if (!prefix) return env;
  const currentPath = env.PATH ?? '';
  const parts = currentPath.split(path.delimiter).filter(Boolean);
  if (parts.includes(prefix)) return env;
  return { ...env, PATH: `${prefix}${path.delimiter}${currentPath}` };
}

interface Invocation {
  file: string;
  args: string[];
  input: string;
}

/**
 * Reasoning backend that shells out to an installed agent CLI. The prompt
 * goes to stdin and stdout is the reply.
 */
export class CliReasoningBackend implements ReasoningBackend {
  readonly provider: CliProvider;
  readonly modelId: string;
  private readonly semaphore: AsyncSemaphore;
  private health: BackendHealth;

  constructor(private readonly options: CliReasoningBackendOptions) {
    if (options.provider === 'command' && !options.command) {
      throw new Error('CliReasoningBackend: the command provider needs an executable');
    }
    this.provider = options.provider;
    this.modelId = options.model;
    this.semaphore = new AsyncSemaphore(options.maxConcurrent);
    this.health = buildInitialHealth(options.provider);
  }

  async chat(options: LlmChatOptions): Promise<LlmChatResult> {
    const invocation = this.buildInvocation(options);
    return this.semaphore.run(async () => {
      if (options.signal?.aborted) {
        throw new Error(`${this.provider} call cancelled`);
      }
      logDebug('CLI backend call', { provider: this.provider, promptLength: invocation.input.length });
      const result = await execa(invocation.file, invocation.args, {
        input: invocation.input,
        env: withCliPath({ ...process.env }),
        signal: options.signal,
        reject: false,
      });
      if (result.isCanceled) {
        throw new Error(`${this.provider} call cancelled`);
      }
      if (result.exitCode !== 0) {
        const errorMsg = String(result.stderr || result.stdout || `${this.provider} CLI error`);
        logWarning('CLI backend call failed', { provider: this.provider, error: errorMsg });
        throw new Error(`${this.provider} CLI exited with ${String(result.exitCode)}: ${errorMsg}`);
      }
      return { provider: this.provider, content: String(result.stdout ?? '') };
    });
  }

  async checkHealth(forceCheck = false): Promise<BackendHealth> {
    const now = Date.now();
    const cached = this.health;
    if (!forceCheck && cached.lastCheck && now - cached.lastCheck < this.options.healthCheckIntervalMs) {
      return cached;
    }

    const env = withCliPath({ ...process.env });
    const probe = this.buildHealthProbe();
    const version = await execa(probe.file, probe.args, { env, timeout: 5000, reject: false });
    if (version.exitCode !== 0) {
      this.health = {
        provider: this.provider,
        available: false,
        authenticated: false,
        lastCheck: now,
        error: String(version.stderr || `${probe.file} not available`),
      };
      return this.health;
    }

    if (this.provider === 'codex') {
      const status = await execa('codex', ['login', 'status'], { env, timeout: 5000, reject: false });
      if (status.exitCode !== 0) {
        this.health = {
          provider: this.provider,
          available: true,
          authenticated: false,
          lastCheck: now,
          error: String(status.stderr || status.stdout || 'Codex CLI not authenticated - run "codex login"'),
        };
        return this.health;
      }
    }

    this.health = {
      provider: this.provider,
      available: true,
      authenticated: true,
      lastCheck: now,
    };
    return this.health;
  }

  private buildInvocation(options: LlmChatOptions): Invocation {
    const prompt = buildFullPrompt(options.messages);
    const systemPrompt = extractSystemPrompt(options.messages);
    const model = options.modelId || this.modelId;

    switch (this.provider) {
      case 'claude': {
        const args = ['--print'];
        if (systemPrompt) args.push('--system-prompt', systemPrompt);
        if (model) args.push('--model', model);
        return { file: 'claude', args, input: prompt };
      }
      case 'codex': {
        const args = ['exec'];
        if (model) args.push('--model', model);
        args.push('-');
        return { file: 'codex', args, input: systemPrompt ? `${systemPrompt}\n\n${prompt}` : prompt };
      }
      case 'command': {
        return {
          file: this.options.command ?? '',
          args: [...(this.options.args ?? [])],
          input: systemPrompt ? `${systemPrompt}\n\n${prompt}` : prompt,
        };
      }
    }
  }

  private buildHealthProbe(): { file: string; args: string[] } {
    if (this.provider === 'command') {
      return { file: this.options.command ?? '', args: [...(this.options.healthArgs ?? ['--version'])] };
    }
    return { file: this.provider, args: ['--version'] };
  }
}

/**
 * Build the configured backend, or null when none is configured.
 */
export function createReasoningBackend(config: BackendConfig): ReasoningBackend | null {
  if (config.provider === 'none') return null;
  return new CliReasoningBackend({
    provider: config.provider,
    model: config.model,
    command: config.command,
    args: config.args,
    healthArgs: config.healthArgs,
    healthCheckIntervalMs: config.healthCheckIntervalMs,
    maxConcurrent: config.maxConcurrent,
  });
}
