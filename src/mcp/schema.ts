/**
 * @fileoverview Zod validators for MCP tool inputs
 *
 * @packageDocumentation
 */

import { z } from 'zod';

// ============================================================================
// SHARED
// ============================================================================

const TaskSchema = z.string().min(1).max(4000).describe('Task description in natural language');

const ContextSchema = z
  .record(z.union([z.string(), z.array(z.string())]))
  .optional()
  .default({})
  .describe('Execution context hints such as tech_stack, file_path, project_type or domain');

const ProjectDirSchema = z
  .string()
  .min(1)
  .optional()
  .describe('Project directory whose detected stack is merged into the context');

// ============================================================================
// TOOL INPUTS
// ============================================================================

export const SelectRulesInputSchema = z.object({
  task: TaskSchema,
  context: ContextSchema,
  project_dir: ProjectDirSchema,
}).strict();

export const GeneratePlanInputSchema = z.object({
  task: TaskSchema,
  context: ContextSchema,
  project_dir: ProjectDirSchema,
}).strict();

export const OrchestrateTaskInputSchema = z.object({
  task: TaskSchema,
  context: ContextSchema,
  project_dir: ProjectDirSchema,
}).strict();

export const AnalyzeProjectInputSchema = z.object({
  path: z.string().min(1).describe('Project directory to analyse'),
}).strict();

export const QueryKnowledgeInputSchema = z.object({
  question: z.string().min(1).max(2000).describe('Question to search the knowledge base for'),
  k: z.number().int().min(1).max(50).optional().describe('Number of passages to return (default 5)'),
  answer: z.boolean().optional().default(false).describe('Also answer the question from the passages'),
}).strict();

export const GetStatusInputSchema = z.object({
  probe: z.boolean().optional().default(false).describe('Probe the backend instead of using the cached status'),
}).strict();

export const ReloadRulesInputSchema = z.object({}).strict();

export type SelectRulesInput = z.infer<typeof SelectRulesInputSchema>;
export type GeneratePlanInput = z.infer<typeof GeneratePlanInputSchema>;
export type OrchestrateTaskInput = z.infer<typeof OrchestrateTaskInputSchema>;
export type QueryKnowledgeInput = z.infer<typeof QueryKnowledgeInputSchema>;
export type GetStatusInput = z.infer<typeof GetStatusInputSchema>;
export type AnalyzeProjectInput = z.infer<typeof AnalyzeProjectInputSchema>;

export const TOOL_INPUT_SCHEMAS = {
  select_rules: SelectRulesInputSchema,
  generate_plan: GeneratePlanInputSchema,
  orchestrate_task: OrchestrateTaskInputSchema,
  analyze_project: AnalyzeProjectInputSchema,
  query_knowledge: QueryKnowledgeInputSchema,
  get_status: GetStatusInputSchema,
  reload_rules: ReloadRulesInputSchema,
} as const;

export type ToolName = keyof typeof TOOL_INPUT_SCHEMAS;

export function isToolName(name: string): name is ToolName {
  return Object.prototype.hasOwnProperty.call(TOOL_INPUT_SCHEMAS, name);
}

// ============================================================================
// PROMPT ARGUMENTS
// ============================================================================

export const OrchestrateTaskPromptArgsSchema = z.object({
  task: z.string().min(1).max(4000),
  context: z.string().optional(),
});

export const AnalyzeCodePromptArgsSchema = z.object({
  code: z.string().min(1),
});

export const PROMPT_ARGUMENT_SCHEMAS = {
  orchestrate_task: OrchestrateTaskPromptArgsSchema,
  analyze_code: AnalyzeCodePromptArgsSchema,
} as const;

export type PromptName = keyof typeof PROMPT_ARGUMENT_SCHEMAS;

export function isPromptName(name: string): name is PromptName {
  return Object.prototype.hasOwnProperty.call(PROMPT_ARGUMENT_SCHEMAS, name);
}

// ============================================================================
// VALIDATION
// ============================================================================

export interface ToolInputIssue {
  path: string;
  message: string;
  code: string;
}

export type ToolValidationResult<T> =
  | { valid: true; errors: []; data: T }
  | { valid: false; errors: ToolInputIssue[] };

/**
 * Validate tool input against its schema. Missing arguments count as `{}`.
 */
export function validateToolInput<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  input: unknown,
): ToolValidationResult<T> {
  const result = schema.safeParse(input ?? {});
  if (result.success) {
    return { valid: true, errors: [], data: result.data };
  }
  return {
    valid: false,
    errors: result.error.errors.map((issue) => ({
      path: issue.path.join('.') || '/',
      message: issue.message,
      code: issue.code,
    })),
  };
}

export function formatIssues(issues: readonly ToolInputIssue[]): string {
  return issues.map((issue) => `${issue.path}: ${issue.message}`).join('; ');
}
