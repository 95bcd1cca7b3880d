/**
 * @fileoverview Shared domain types
 *
 * Rules, classifications, selections and plans. Collections documented as
 * sets are arrays with unique members so they serialize to JSON unchanged.
 */

import { z } from 'zod';
import type { ReasoningMode } from './core/result.js';

// ============================================================================
// ENUMS
// ============================================================================

export const RULE_CATEGORIES = [
  'policy',
  'security',
  'architecture',
  'api',
  'data',
  'quality',
  'testing',
  'infrastructure',
  'performance',
  'reasoning',
  'agent',
  'documentation',
  'learning',
] as const;
export type RuleCategory = (typeof RULE_CATEGORIES)[number];
export const RuleCategorySchema = z.enum(RULE_CATEGORIES);

export const PROJECT_TYPES = [
  'web_app',
  'api_microservices',
  'ml_ai',
  'mobile_app',
  'iot_embedded',
  'enterprise_system',
  'cli_tool',
  'library',
] as const;
export type ProjectType = (typeof PROJECT_TYPES)[number];
export const ProjectTypeSchema = z.enum(PROJECT_TYPES);

export const COMPLEXITY_LEVELS = ['low', 'medium', 'high'] as const;
export type Complexity = (typeof COMPLEXITY_LEVELS)[number];
export const ComplexitySchema = z.enum(COMPLEXITY_LEVELS);

/** Risk flag attached to every heuristic classification. */
export const FALLBACK_RISK_FLAG = 'fallback_used';

// ============================================================================
// RULES
// ============================================================================

export interface Rule {
  readonly id: string;
  readonly title: string;
  readonly category: RuleCategory;
  readonly description: string;
  /** Lower-cased, unique. */
  readonly applicabilityTags: readonly string[];
  readonly mandatory: boolean;
}

// ============================================================================
// REQUEST CONTEXT
// ============================================================================

/**
 * Execution context hints supplied with a task, e.g.
 * `{ tech_stack: ['python'], file_path: 'api/reports.py' }`.
 */
export type TaskContext = Readonly<Record<string, string | readonly string[] | undefined>>;

export const TaskContextSchema = z.record(z.union([z.string(), z.array(z.string())]));

// ============================================================================
// CLASSIFICATION
// ============================================================================

export interface TaskClassification {
  readonly projectType: ProjectType;
  readonly complexity: Complexity;
  readonly riskFlags: readonly string[];
  /** In [0, 1]; heuristic results never exceed 0.5. */
  readonly confidence: number;
}

export const TaskClassificationSchema = z.object({
  projectType: ProjectTypeSchema,
  complexity: ComplexitySchema,
  riskFlags: z.array(z.string()),
  confidence: z.number().min(0).max(1),
});

// ============================================================================
// SELECTION
// ============================================================================

export interface RuleScore {
  readonly tagOverlap: number;
  readonly categoryWeight: number;
  readonly aiAdjustment: number;
  readonly total: number;
}

export interface RuleSelection {
  /** Priority order, no duplicates; mandatory rules first. */
  readonly orderedRuleIds: readonly string[];
  readonly rationale: string;
  readonly mode: ReasoningMode;
  readonly scores: Readonly<Record<string, RuleScore>>;
}

// ============================================================================
// PLANNING
// ============================================================================

export interface Stage {
  readonly name: string;
  readonly description: string;
  readonly ruleIds: readonly string[];
  readonly qualityGates: readonly string[];
}

export interface ExecutionPlan {
  readonly template: string;
  readonly stages: readonly Stage[];
  readonly mode: ReasoningMode;
}
