/**
 * Shared test doubles: a scripted reasoning backend, an in-memory source
 * lister and a configuration built from the bundled defaults.
 */

import type {
  BackendHealth,
  LlmChatOptions,
  LlmChatResult,
  ReasoningBackend,
} from '../adapters/llm_service.js';
import { parseConfig, type RuleweaverConfig } from '../config/index.js';
import type { SourceDocument, SourceLister } from '../knowledge/knowledge_index.js';
import { RuleCatalog } from '../rules/rule_catalog.js';

// ============================================================================
// REASONING BACKEND
// ============================================================================

/**
 * A scripted reply: text, a thrown error, a delayed text, or a call that
 * never settles until its signal aborts.
 */
export type ScriptedReply =
  | string
  | Error
  | { delayMs: number; content: string }
  | { hang: true };

export class FakeReasoningBackend implements ReasoningBackend {
  readonly provider: string;
  readonly modelId = 'fake-model';
  readonly calls: LlmChatOptions[] = [];
  health: BackendHealth;
  healthChecks = 0;
  private readonly replies: ScriptedReply[];

  constructor(replies: ScriptedReply[] = [], provider = 'fake') {
    this.provider = provider;
    this.replies = [...replies];
    this.health = { provider, available: true, authenticated: true, lastCheck: 0 };
  }

  enqueue(...replies: ScriptedReply[]): void {
    this.replies.push(...replies);
  }

  async chat(options: LlmChatOptions): Promise<LlmChatResult> {
    this.calls.push(options);
    const reply = this.replies.shift();
    if (reply === undefined) {
      throw new Error('no scripted reply left');
    }
    if (typeof reply === 'string') {
      return { provider: this.provider, content: reply };
    }
    if (reply instanceof Error) {
      throw reply;
    }
    if ('hang' in reply) {
      return new Promise<LlmChatResult>((_, reject) => {
        options.signal?.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
      });
    }
    await new Promise((resolve) => setTimeout(resolve, reply.delayMs));
    return { provider: this.provider, content: reply.content };
  }

  async checkHealth(): Promise<BackendHealth> {
    this.healthChecks += 1;
    return this.health;
  }

  /** Text of the last user message sent. */
  lastPrompt(): string {
    const last = this.calls[this.calls.length - 1];
    const user = last?.messages.filter((message) => message.role === 'user') ?? [];
    return user.map((message) => message.content).join('\n');
  }
}

// ============================================================================
// KNOWLEDGE SOURCES
// ============================================================================

export interface MemoryDocument {
  text: string;
  fingerprint?: string;
  /** load() rejects with this message. */
  failWith?: string;
}

export class MemorySourceLister implements SourceLister {
  readonly documents = new Map<string, MemoryDocument>();
  listCalls = 0;
  failList: string | null = null;

  constructor(initial: Record<string, string> = {}) {
    for (const [id, text] of Object.entries(initial)) {
      this.set(id, text);
    }
  }

  set(id: string, text: string, fingerprint?: string): void {
    this.documents.set(id, { text, fingerprint });
  }

  async list(): Promise<SourceDocument[]> {
    this.listCalls += 1;
    if (this.failList) throw new Error(this.failList);
    return [...this.documents.entries()].map(([id, document]) => ({
      id,
      fingerprint: document.fingerprint ?? `len-${document.text.length}:${document.text.slice(0, 16)}`,
      load: () =>
        document.failWith
          ? Promise.reject(new Error(document.failWith))
          : Promise.resolve(document.text),
    }));
  }
}

// ============================================================================
// CONFIGURATION AND CATALOGS
// ============================================================================

/** Bundled defaults with an optional override layer. */
export function testConfig(layer: Record<string, unknown> = {}): RuleweaverConfig {
  return parseConfig(
    { knowledge: { directory: '/tmp/ruleweaver-test-knowledge' }, ...layer },
    '/tmp',
  );
}

export const SAMPLE_RULES = [
  { id: 'base', title: 'Base policy', category: 'policy', mandatory: true, tags: ['always'] },
  { id: 'sec', title: 'Security', category: 'security', tags: ['auth', 'jwt', 'security_sensitive'] },
  { id: 'api', title: 'API design', category: 'api', tags: ['api', 'endpoint'] },
  { id: 'docs', title: 'Docs', category: 'documentation', tags: ['docs'] },
  { id: 'tests', title: 'Testing', category: 'testing', tags: ['test', 'complexity:medium'] },
];

export function sampleCatalog(): RuleCatalog {
  return RuleCatalog.load(SAMPLE_RULES, { version: 'sample-1', source: 'memory' });
}

/** JSON reply the classifier accepts. */
export function classificationReply(
  overrides: Partial<{ project_type: string; complexity: string; risk_flags: string[]; confidence: number }> = {},
): string {
  return JSON.stringify({
    project_type: 'api_microservices',
    complexity: 'low',
    risk_flags: [],
    confidence: 0.8,
    ...overrides,
  });
}
