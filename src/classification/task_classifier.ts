/**
 * @fileoverview Task classification
 *
 * Asks the reasoning backend for a structured classification and falls back
 * to keyword tables when the backend is absent, slow, failing or returns
 * something that does not validate. Heuristic confidence stays at or below
 * 0.5; AI confidence is mapped into [0.55, 1], so the two ranges never meet.
 */

import { z } from 'zod';
import { requestStructured } from '../adapters/backend_request.js';
import type { ReasoningBackend } from '../adapters/llm_service.js';
import type { ClassificationConfig } from '../config/schema.js';
import { aiOutcome, fallbackOutcome, type ReasoningOutcome } from '../core/result.js';
import { logDebug } from '../telemetry/logger.js';
import {
  COMPLEXITY_LEVELS,
  ComplexitySchema,
  FALLBACK_RISK_FLAG,
  PROJECT_TYPES,
  ProjectTypeSchema,
  type Complexity,
  type ProjectType,
  type TaskClassification,
  type TaskContext,
} from '../types.js';
import { classificationText, contextValues, KeywordMatcher } from './keywords.js';

// ============================================================================
// CONSTANTS
// ============================================================================

export const HEURISTIC_BASE_CONFIDENCE = 0.2;
export const HEURISTIC_CONFIDENCE_SPAN = 0.3;
export const AI_BASE_CONFIDENCE = 0.55;
export const AI_CONFIDENCE_SPAN = 0.45;

/** Reply shape requested from the backend. */
export const AiClassificationSchema = z.object({
  project_type: ProjectTypeSchema,
  complexity: ComplexitySchema,
  risk_flags: z.array(z.string()).default([]),
  confidence: z.number().min(0).max(1),
});

export type ClassificationOutcome = ReasoningOutcome<TaskClassification>;

export interface TaskClassifierOptions {
  timeoutMs: number;
}

// ============================================================================
// HELPERS
// ============================================================================

function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

export function normalizeRiskFlag(flag: string): string {
  return flag.trim().toLowerCase().replace(/[^a-z0-9]+/g, '_').replace(/^_+|_+$/g, '');
}

function uniqueFlags(flags: readonly string[]): string[] {
  const seen = new Set<string>();
  for (const flag of flags) {
    const normalized = normalizeRiskFlag(flag);
    if (normalized && normalized !== FALLBACK_RISK_FLAG) seen.add(normalized);
  }
  return [...seen];
}

function hintedProjectType(context: TaskContext): ProjectType | null {
  for (const value of contextValues(context, 'project_type')) {
    const parsed = ProjectTypeSchema.safeParse(value.trim().toLowerCase());
    if (parsed.success) return parsed.data;
  }
  return null;
}

function buildPrompt(task: string, context: TaskContext): string {
  const contextLines = Object.entries(context)
    .filter((entry): entry is [string, string | readonly string[]] => entry[1] !== undefined)
    .map(([key, value]) => `- ${key}: ${typeof value === 'string' ? value : value.join(', ')}`);
  return [
    'Classify this software development task.',
    '',
    `Task: ${task}`,
    contextLines.length > 0 ? `Context:\n${contextLines.join('\n')}` : 'Context: none',
    '',
    'Reply with JSON only, in this shape:',
    '{"project_type": "<type>", "complexity": "<level>", "risk_flags": ["<flag>"], "confidence": <0..1>}',
    `project_type is one of: ${PROJECT_TYPES.join(', ')}`,
    `complexity is one of: ${COMPLEXITY_LEVELS.join(', ')}`,
    'risk_flags are short snake_case labels such as security_sensitive, data_migration, production_impact.',
  ].join('\n');
}

// ============================================================================
// CLASSIFIER
// ============================================================================

export class TaskClassifier {
  constructor(
    private readonly backend: ReasoningBackend | null,
    private readonly config: ClassificationConfig,
    private readonly options: TaskClassifierOptions,
  ) {}

  async classify(task: string, context: TaskContext = {}, signal?: AbortSignal): Promise<ClassificationOutcome> {
    const reply = await requestStructured(
      this.backend,
      {
        purpose: 'classify task',
        timeoutMs: this.options.timeoutMs,
        signal,
        messages: [
          { role: 'system', content: 'You classify software tasks for a coding agent. Answer with JSON only.' },
          { role: 'user', content: buildPrompt(task, context) },
        ],
      },
      AiClassificationSchema,
    );

    if (reply.ok) {
      return aiOutcome({
        projectType: reply.value.project_type,
        complexity: reply.value.complexity,
        riskFlags: uniqueFlags(reply.value.risk_flags),
        confidence: round(AI_BASE_CONFIDENCE + AI_CONFIDENCE_SPAN * reply.value.confidence, 3),
      });
    }

    logDebug('Classifying with keyword heuristics', { reason: reply.error.reason });
    return fallbackOutcome(this.classifyHeuristically(task, context), reply.error.message);
  }

  /**
   * Keyword classification. Deterministic; always carries the
   * `fallback_used` risk flag.
   */
  classifyHeuristically(task: string, context: TaskContext = {}): TaskClassification {
    const matcher = new KeywordMatcher(classificationText(task, context));

    const hinted = hintedProjectType(context);
    const detected = hinted ?? this.detectProjectType(matcher);
    const complexity = this.detectComplexity(matcher);

    const riskFlags: string[] = [];
    for (const [flag, keywords] of Object.entries(this.config.riskKeywords)) {
      if (matcher.count(keywords) > 0) riskFlags.push(normalizeRiskFlag(flag));
    }

    const signals = (detected ? 1 : 0) + (complexity ? 1 : 0) + riskFlags.length;
    const confidence = HEURISTIC_BASE_CONFIDENCE + HEURISTIC_CONFIDENCE_SPAN * Math.min(signals / 4, 1);

    return {
      projectType: detected ?? this.config.defaultProjectType,
      complexity: complexity ?? this.config.defaultComplexity,
      riskFlags: [...uniqueFlags(riskFlags), FALLBACK_RISK_FLAG],
      confidence: round(confidence, 2),
    };
  }

  /** Project type with the most keyword hits; first in declaration order on ties. */
  private detectProjectType(matcher: KeywordMatcher): ProjectType | null {
    let best: ProjectType | null = null;
    let bestHits = 0;
    for (const projectType of PROJECT_TYPES) {
      const hits = matcher.count(this.config.projectTypeKeywords[projectType] ?? []);
      if (hits > bestHits) {
        best = projectType;
        bestHits = hits;
      }
    }
    return best;
  }

  /**
   * Any high keyword wins; medium needs more hits than low; low needs at
   * least one hit. Null when nothing matched.
   */
  private detectComplexity(matcher: KeywordMatcher): Complexity | null {
    const hits = (level: Complexity): number => matcher.count(this.config.complexityKeywords[level] ?? []);
    const high = hits('high');
    const medium = hits('medium');
    const low = hits('low');
    if (high > 0) return 'high';
    if (medium > 0 && medium > low) return 'medium';
    if (low > 0) return 'low';
    if (medium > 0) return 'medium';
    return null;
  }
}
