/**
 * @fileoverview Knowledge answers
 *
 * Summarizes retrieved passages with the reasoning backend when it answers in
 * time; otherwise returns a digest of the passages themselves.
 */

import { requestCompletion } from '../adapters/backend_request.js';
import type { ReasoningBackend } from '../adapters/llm_service.js';
import type { ReasoningMode } from '../core/result.js';
import { buildContext, estimateConfidence, type SearchResult } from './retriever.js';

export interface KnowledgeAnswer {
  answer: string;
  mode: ReasoningMode;
  confidence: number;
  sources: string[];
  /** Present on the fallback path. */
  fallbackReason?: string;
}

export interface KnowledgeAnswererOptions {
  timeoutMs: number;
}

const DIGEST_CHARS = 500;
export const NO_KNOWLEDGE_ANSWER = 'No relevant knowledge found for this question.';

const SYSTEM_PROMPT = [
  'You answer questions for a coding agent using only the knowledge base passages provided.',
  'If the passages do not fully answer the question, say so and give the best information available.',
  'Name the documents you relied on. Be concise.',
].join(' ');

export function buildDigest(results: readonly SearchResult[]): string {
  if (results.length === 0) return NO_KNOWLEDGE_ANSWER;
  return `Based on knowledge base context:\n\n${buildContext(results).slice(0, DIGEST_CHARS)}`;
}

export class KnowledgeAnswerer {
  constructor(
    private readonly backend: ReasoningBackend | null,
    private readonly options: KnowledgeAnswererOptions,
  ) {}

  async answer(question: string, results: readonly SearchResult[], signal?: AbortSignal): Promise<KnowledgeAnswer> {
    const sources = [...new Set(results.map((result) => result.chunk.sourceId))];
    const confidence = estimateConfidence(results);

    if (results.length === 0) {
      return { answer: NO_KNOWLEDGE_ANSWER, mode: 'fallback', confidence, sources, fallbackReason: 'no passages retrieved' };
    }

    const completion = await requestCompletion(this.backend, {
      purpose: 'answer knowledge question',
      timeoutMs: this.options.timeoutMs,
      signal,
      messages: [
        { role: 'system', content: SYSTEM_PROMPT },
        { role: 'user', content: `Question: ${question}\n\nKnowledge base context:\n${buildContext(results)}\n\nAnswer:` },
      ],
    });

    if (completion.ok && completion.value.trim().length > 0) {
      return { answer: completion.value.trim(), mode: 'ai', confidence, sources };
    }
    const fallbackReason = completion.ok ? 'empty reply from backend' : completion.error.message;
    return { answer: buildDigest(results), mode: 'fallback', confidence, sources, fallbackReason };
  }
}
