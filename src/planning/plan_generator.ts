/**
 * @fileoverview Execution plan generation
 *
 * Complexity picks a stage template; each selected rule lands in the stage
 * its category maps to, or in the template's first stage when that stage is
 * not part of the template. Quality gates follow the rules into their stage
 * and are deduplicated in first-seen order.
 */

import type { PlanningConfig } from '../config/schema.js';
import { InvalidClassificationError, NotFoundError } from '../core/errors.js';
import type { ReasoningMode } from '../core/result.js';
import type { RuleCatalog } from '../rules/rule_catalog.js';
import {
  TaskClassificationSchema,
  type Complexity,
  type ExecutionPlan,
  type Stage,
  type TaskClassification,
} from '../types.js';

interface StageDraft {
  name: string;
  description: string;
  ruleIds: string[];
  qualityGates: string[];
}

function pushUnique(target: string[], values: readonly string[]): void {
  for (const value of values) {
    if (!target.includes(value)) target.push(value);
  }
}

/**
 * Validate an untyped classification, e.g. one received over MCP.
 */
export function parseClassification(candidate: unknown): TaskClassification {
  const parsed = TaskClassificationSchema.safeParse(candidate);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '/'}: ${issue.message}`);
    const missing = parsed.error.issues.some((issue) => issue.path[0] === 'complexity');
    throw new InvalidClassificationError(
      missing ? 'complexity is missing or invalid' : 'classification does not match the expected shape',
      issues,
    );
  }
  return parsed.data;
}

export class PlanGenerator {
  constructor(
    private readonly catalog: RuleCatalog,
    private readonly config: PlanningConfig,
  ) {}

  /** Name of the stage template used for `complexity`. */
  templateFor(complexity: Complexity): string {
    return this.config.complexityTemplates[complexity];
  }

  /**
   * Build the plan for `ruleIds` (in selection order). Throws
   * InvalidClassificationError for a malformed classification and
   * NotFoundError for a rule id the catalog does not hold.
   */
  generate(classification: unknown, ruleIds: readonly string[], mode: ReasoningMode): ExecutionPlan {
    const { complexity } = parseClassification(classification);
    const template = this.templateFor(complexity);
    const definitions = this.config.stageTemplates[template];
    if (!definitions || definitions.length === 0) {
      throw new NotFoundError('stage_template', template);
    }

    const drafts: StageDraft[] = definitions.map((definition) => ({
      name: definition.name,
      description: definition.description,
      ruleIds: [],
      qualityGates: [],
    }));
    const byName = new Map(drafts.map((draft) => [draft.name, draft]));
    const firstStage = drafts[0];

    for (const ruleId of ruleIds) {
      const rule = this.catalog.get(ruleId);
      const mapped = this.config.categoryStages[rule.category];
      const stage = (mapped !== undefined ? byName.get(mapped) : undefined) ?? firstStage;
      pushUnique(stage.ruleIds, [rule.id]);
      pushUnique(stage.qualityGates, this.config.categoryGates[rule.category] ?? []);
    }

    const stages: Stage[] = drafts.map((draft) => ({
      name: draft.name,
      description: draft.description,
      ruleIds: draft.ruleIds,
      qualityGates: draft.qualityGates,
    }));
    return { template, stages, mode };
  }
}
