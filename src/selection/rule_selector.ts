/**
 * @fileoverview Rule selection
 *
 * Scores every catalog rule against a classification:
 *
 *   total = tagOverlap + categoryWeight + aiAdjustment
 *
 * - tagOverlap: `tagWeight` per rule tag found among the classification tags,
 *   capped at 1.
 * - categoryWeight: configured weight for the rule's category given the
 *   project type, complexity and risk flags, clamped to [0, 1].
 * - aiAdjustment: delta proposed by the reasoning backend, clamped to
 *   ±aiAdjustmentLimit; 0 on the heuristic path.
 *
 * Mandatory rules lead every selection in catalog order. The remaining rules
 * with a total above the threshold follow by descending total, ties in
 * catalog order.
 */

import { z } from 'zod';
import { requestStructured } from '../adapters/backend_request.js';
import type { ReasoningBackend } from '../adapters/llm_service.js';
import type { RulesConfig, SelectionConfig } from '../config/schema.js';
import { ConfigurationError } from '../core/errors.js';
import type { RuleCatalog } from '../rules/rule_catalog.js';
import { buildContext, type SearchResult } from '../knowledge/retriever.js';
import { contextValues, significantTokens } from '../classification/keywords.js';
import { logDebug, logWarning } from '../telemetry/logger.js';
import type {
  Rule,
  RuleCategory,
  RuleScore,
  RuleSelection,
  TaskClassification,
  TaskContext,
} from '../types.js';

// ============================================================================
// TYPES
// ============================================================================

export const AiAdjustmentSchema = z.object({
  adjustments: z.array(z.object({
    rule_id: z.string(),
    delta: z.number(),
  })).default([]),
  rationale: z.string().default(''),
});

export interface RuleSelectorOptions {
  rules: RulesConfig;
  selection: SelectionConfig;
  stopwords: readonly string[];
  timeoutMs: number;
  /** Characters of each grounding passage included in the prompt. */
  groundingChars?: number;
}

export interface SelectionRequest {
  task: string;
  classification: TaskClassification;
  context?: TaskContext;
  /** Retrieved passages included in the backend prompt. */
  knowledge?: readonly SearchResult[];
  signal?: AbortSignal;
}

const DEFAULT_GROUNDING_CHARS = 400;
const SCORE_DIGITS = 4;

function round(value: number): number {
  const factor = 10 ** SCORE_DIGITS;
  return Math.round(value * factor) / factor;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

// ============================================================================
// TAGS
// ============================================================================

/**
 * Tags describing a classified task: `project:<type>`, `complexity:<level>`,
 * risk flags, tech stack entries and significant task words.
 */
export function classificationTags(
  task: string,
  classification: TaskClassification,
  context: TaskContext,
  stopwords: readonly string[],
): Set<string> {
  const tags = new Set<string>([
    `project:${classification.projectType}`,
    `complexity:${classification.complexity}`,
  ]);
  for (const flag of classification.riskFlags) tags.add(flag.toLowerCase());
  for (const tech of contextValues(context, 'tech_stack')) {
    const normalized = tech.trim().toLowerCase();
    if (normalized) tags.add(normalized);
  }
  for (const token of significantTokens(task, stopwords)) tags.add(token);
  return tags;
}

// ============================================================================
// SELECTOR
// ============================================================================

export class RuleSelector {
  private readonly mandatoryIds: ReadonlySet<string>;

  constructor(
    private readonly catalog: RuleCatalog,
    private readonly backend: ReasoningBackend | null,
    private readonly options: RuleSelectorOptions,
  ) {
    const unknown = options.rules.mandatory.filter((id) => !catalog.has(id));
    if (unknown.length > 0) {
      throw new ConfigurationError('rules.mandatory', `unknown rule ids: ${unknown.join(', ')}`);
    }
    this.mandatoryIds = new Set([
      ...catalog.mandatory().map((rule) => rule.id),
      ...options.rules.mandatory,
    ]);
  }

  /** Mandatory rules in catalog order. */
  mandatoryRules(): Rule[] {
    return this.catalog.all().filter((rule) => this.mandatoryIds.has(rule.id));
  }

  /**
   * Select rules for a classified task. Never rejects because of the
   * backend: any backend failure yields the heuristic selection.
   */
  async select(request: SelectionRequest): Promise<RuleSelection> {
    const context = request.context ?? {};
    const heuristic = this.scoreAll(request.task, request.classification, context, new Map());

    const reply = await requestStructured(
      this.backend,
      {
        purpose: 'select rules',
        timeoutMs: this.options.timeoutMs,
        signal: request.signal,
        messages: [
          {
            role: 'system',
            content: 'You adjust rule relevance scores for a coding agent. Answer with JSON only.',
          },
          { role: 'user', content: this.buildPrompt(request, heuristic) },
        ],
      },
      AiAdjustmentSchema,
    );

    if (!reply.ok) {
      logDebug('Selecting rules with heuristic scores', { reason: reply.error.reason });
      return this.finish(heuristic, 'fallback', `Fallback heuristic selection (${reply.error.reason})`);
    }

    const adjustments = new Map<string, number>();
    const limit = this.options.rules.aiAdjustmentLimit;
    for (const { rule_id: ruleId, delta } of reply.value.adjustments) {
      if (!this.catalog.has(ruleId)) {
        logWarning('Ignoring adjustment for unknown rule', { ruleId });
        continue;
      }
      adjustments.set(ruleId, clamp(delta, -limit, limit));
    }
    const scores = this.scoreAll(request.task, request.classification, context, adjustments);
    const note = reply.value.rationale.trim();
    const label = `AI-assisted selection (${this.backend?.provider ?? 'none'})`;
    return this.finish(scores, 'ai', note ? `${label}: ${note}` : label);
  }

  /** Heuristic-only selection, without calling the backend. */
  selectHeuristically(task: string, classification: TaskClassification, context: TaskContext = {}): RuleSelection {
    const scores = this.scoreAll(task, classification, context, new Map());
    return this.finish(scores, 'fallback', 'Fallback heuristic selection (requested)');
  }

  /** Configured category weight for a classification, clamped to [0, 1]. */
  categoryWeight(category: RuleCategory, classification: TaskClassification): number {
    const weights = this.options.selection.categoryWeights;
    let weight = weights.base[category] ?? 0;
    weight += weights.byProjectType[classification.projectType]?.[category] ?? 0;
    weight += weights.byComplexity[classification.complexity]?.[category] ?? 0;
    for (const flag of classification.riskFlags) {
      weight += weights.byRiskFlag[flag]?.[category] ?? 0;
    }
    return round(clamp(weight, 0, 1));
  }

  // ==========================================================================
  // INTERNALS
  // ==========================================================================

  private scoreAll(
    task: string,
    classification: TaskClassification,
    context: TaskContext,
    adjustments: ReadonlyMap<string, number>,
  ): Map<string, RuleScore> {
    const tags = classificationTags(task, classification, context, this.options.stopwords);
    const scores = new Map<string, RuleScore>();
    for (const rule of this.catalog.all()) {
      const matches = rule.applicabilityTags.filter((tag) => tags.has(tag)).length;
      const tagOverlap = round(Math.min(1, matches * this.options.rules.tagWeight));
      const categoryWeight = this.categoryWeight(rule.category, classification);
      const aiAdjustment = round(adjustments.get(rule.id) ?? 0);
      scores.set(rule.id, {
        tagOverlap,
        categoryWeight,
        aiAdjustment,
        total: round(tagOverlap + categoryWeight + aiAdjustment),
      });
    }
    return scores;
  }

  private finish(scores: Map<string, RuleScore>, mode: RuleSelection['mode'], label: string): RuleSelection {
    const threshold = this.options.rules.threshold;
    const mandatory = this.mandatoryRules().map((rule) => rule.id);

    // catalog.all() is already in catalog order, and sort is stable.
    let scored = this.catalog.all()
      .filter((rule) => !this.mandatoryIds.has(rule.id))
      .filter((rule) => (scores.get(rule.id)?.total ?? 0) > threshold)
      .sort((a, b) => (scores.get(b.id)?.total ?? 0) - (scores.get(a.id)?.total ?? 0))
      .map((rule) => rule.id);
    if (this.options.rules.maxRules !== undefined) {
      scored = scored.slice(0, this.options.rules.maxRules);
    }

    const summary = `${scored.length} rule(s) scored above ${threshold}`
      + (mandatory.length > 0 ? `; mandatory: ${mandatory.join(', ')}` : '');
    return {
      orderedRuleIds: [...mandatory, ...scored],
      rationale: `${label}. ${summary}`,
      mode,
      scores: Object.fromEntries(scores),
    };
  }

  private buildPrompt(request: SelectionRequest, heuristic: ReadonlyMap<string, RuleScore>): string {
    const { classification } = request;
    const limit = this.options.rules.aiAdjustmentLimit;
    const ruleLines = this.catalog.all().map((rule) => {
      const score = heuristic.get(rule.id)?.total ?? 0;
      return `- ${rule.id} [${rule.category}] score=${score.toFixed(2)}: ${rule.title}. ${rule.description}`;
    });
    const knowledge = request.knowledge && request.knowledge.length > 0
      ? ['', 'Relevant knowledge:', buildContext(request.knowledge, this.options.groundingChars ?? DEFAULT_GROUNDING_CHARS)]
      : [];
    return [
      `Task: ${request.task}`,
      `Classification: project_type=${classification.projectType}, complexity=${classification.complexity}, `
        + `risk_flags=${classification.riskFlags.join(', ') || 'none'}`,
      ...knowledge,
      '',
      'Rules with their current relevance scores:',
      ...ruleLines,
      '',
      `Propose score adjustments between -${limit} and ${limit} for rules whose relevance the scores misjudge.`,
      'Reply with JSON only: {"adjustments": [{"rule_id": "<id>", "delta": <number>}], "rationale": "<one sentence>"}',
    ].join('\n');
  }
}
