/**
 * @fileoverview Configuration schema
 *
 * Zod schemas for the merged configuration document. Every field is given a
 * value by config/defaults.yaml; the schema only validates.
 *
 * @packageDocumentation
 */

import { z } from 'zod';
import {
  ComplexitySchema,
  ProjectTypeSchema,
  RuleCategorySchema,
} from '../types.js';

// ============================================================================
// SECTIONS
// ============================================================================

export const BackendProviderSchema = z.enum(['none', 'claude', 'codex', 'command']);
export type BackendProvider = z.infer<typeof BackendProviderSchema>;

export const BackendConfigSchema = z.object({
  provider: BackendProviderSchema,
  model: z.string(),
  /** Executable for the `command` provider; receives the prompt on stdin. */
  command: z.string().min(1).optional(),
  args: z.array(z.string()),
  healthArgs: z.array(z.string()),
  timeoutMs: z.number().int().positive(),
  healthCheckIntervalMs: z.number().int().positive(),
  maxConcurrent: z.number().int().positive(),
}).strict().superRefine((backend, ctx) => {
  if (backend.provider === 'command' && !backend.command) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['command'],
      message: 'backend.command is required when provider is "command"',
    });
  }
});

export const KnowledgeConfigSchema = z.object({
  directory: z.string().min(1),
  include: z.array(z.string()).min(1),
  exclude: z.array(z.string()),
  chunkSize: z.number().int().min(50),
  overlap: z.number().min(0).max(0.9),
  defaultK: z.number().int().min(1),
  refreshIntervalMs: z.number().int().min(1000),
  embeddingDimension: z.number().int().min(16).max(4096),
  /** Passages retrieved to ground the selection prompt; 0 disables. */
  groundingPassages: z.number().int().min(0),
}).strict();

export const RulesConfigSchema = z.object({
  /** File or directory of rule YAML; the bundled catalog when absent. */
  path: z.string().min(1).optional(),
  /** Rule ids forced into every selection in addition to catalog-mandatory ones. */
  mandatory: z.array(z.string()),
  threshold: z.number(),
  maxRules: z.number().int().positive().optional(),
  tagWeight: z.number().min(0).max(1),
  aiAdjustmentLimit: z.number().min(0).max(1),
}).strict();

const KeywordListSchema = z.array(z.string().min(1));

export const ClassificationConfigSchema = z.object({
  defaultProjectType: ProjectTypeSchema,
  defaultComplexity: ComplexitySchema,
  projectTypeKeywords: z.record(ProjectTypeSchema, KeywordListSchema),
  complexityKeywords: z.record(ComplexitySchema, KeywordListSchema),
  riskKeywords: z.record(z.string(), KeywordListSchema),
  stopwords: z.array(z.string()),
}).strict();

export const AnalysisConfigSchema = z.object({
  exclude: z.array(z.string()),
  /** Files beyond this count are not walked; the profile reports `truncated`. */
  maxFiles: z.number().int().positive(),
  /** Lowercase extension without the dot, to technology name. */
  extensions: z.record(z.string(), z.string().min(1)),
  /** Dependency manifests scanned for framework names. */
  manifests: z.array(z.string().min(1)),
  /** Framework name to the package names that reveal it. */
  frameworks: z.record(z.string(), KeywordListSchema),
  /** First rule naming a detected technology decides the project type. */
  projectTypeRules: z.array(z.object({
    projectType: ProjectTypeSchema,
    anyOf: KeywordListSchema.min(1),
  }).strict()),
}).strict();

const CategoryWeightTableSchema = z.record(RuleCategorySchema, z.number());

export const SelectionConfigSchema = z.object({
  categoryWeights: z.object({
    base: CategoryWeightTableSchema,
    byProjectType: z.record(ProjectTypeSchema, CategoryWeightTableSchema),
    byComplexity: z.record(ComplexitySchema, CategoryWeightTableSchema),
    byRiskFlag: z.record(z.string(), CategoryWeightTableSchema),
  }).strict(),
}).strict();

export const StageDefinitionSchema = z.object({
  name: z.string().min(1),
  description: z.string(),
}).strict();
export type StageDefinition = z.infer<typeof StageDefinitionSchema>;

export const PlanningConfigSchema = z.object({
  stageTemplates: z.record(z.string(), z.array(StageDefinitionSchema).min(1)),
  complexityTemplates: z.object({
    low: z.string(),
    medium: z.string(),
    high: z.string(),
  }).strict(),
  categoryStages: z.record(RuleCategorySchema, z.string()),
  categoryGates: z.record(RuleCategorySchema, z.array(z.string().min(1))),
}).strict().superRefine((planning, ctx) => {
  for (const [complexity, template] of Object.entries(planning.complexityTemplates)) {
    if (!(template in planning.stageTemplates)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['complexityTemplates', complexity],
        message: `Unknown stage template "${template}"`,
      });
    }
  }
  for (const [name, stages] of Object.entries(planning.stageTemplates)) {
    const seen = new Set<string>();
    for (const stage of stages) {
      if (seen.has(stage.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['stageTemplates', name],
          message: `Duplicate stage "${stage.name}"`,
        });
      }
      seen.add(stage.name);
    }
  }
});
export type PlanningConfig = z.infer<typeof PlanningConfigSchema>;

// ============================================================================
// ROOT
// ============================================================================

export const RuleweaverConfigSchema = z.object({
  backend: BackendConfigSchema,
  knowledge: KnowledgeConfigSchema,
  rules: RulesConfigSchema,
  classification: ClassificationConfigSchema,
  analysis: AnalysisConfigSchema,
  selection: SelectionConfigSchema,
  planning: PlanningConfigSchema,
}).strict();

export type RuleweaverConfig = z.infer<typeof RuleweaverConfigSchema>;
export type BackendConfig = RuleweaverConfig['backend'];
export type KnowledgeConfig = RuleweaverConfig['knowledge'];
export type RulesConfig = RuleweaverConfig['rules'];
export type ClassificationConfig = RuleweaverConfig['classification'];
export type AnalysisConfig = RuleweaverConfig['analysis'];
export type SelectionConfig = RuleweaverConfig['selection'];
