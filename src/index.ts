/**
 * @fileoverview Ruleweaver - rule selection, execution planning and knowledge
 * retrieval for coding agents
 *
 * Every response carries a `mode`: `ai` when the reasoning backend produced
 * it, `fallback` when deterministic heuristics did. A missing, slow or failing
 * backend never turns a request into an error.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { createOrchestrator } from 'ruleweaver';
 *
 * const orchestrator = await createOrchestrator({ cwd: '/path/to/project' });
 * orchestrator.start();
 *
 * const result = await orchestrator.orchestrate('Implement user authentication with JWT');
 * console.log(result.mode, result.rules.map((rule) => rule.id));
 *
 * await orchestrator.stop();
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// PRIMARY ENTRY POINT
// ============================================================================

export * from './orchestrator/index.js';

// ============================================================================
// DOMAIN TYPES
// ============================================================================

export {
  RULE_CATEGORIES,
  PROJECT_TYPES,
  COMPLEXITY_LEVELS,
  FALLBACK_RISK_FLAG,
  TaskClassificationSchema,
  type Rule,
  type RuleCategory,
  type ProjectType,
  type Complexity,
  type TaskContext,
  type TaskClassification,
  type RuleScore,
  type RuleSelection,
  type Stage,
  type ExecutionPlan,
} from './types.js';

// ============================================================================
// COMPONENTS
// ============================================================================

export { RuleCatalog, RuleDefinitionSchema, type RuleDefinition } from './rules/rule_catalog.js';
export { loadRuleCatalog, BUNDLED_RULES_PATH } from './rules/rule_loader.js';
export { TaskClassifier, type ClassificationOutcome } from './classification/task_classifier.js';
export {
  ProjectAnalyzer,
  manifestPackages,
  projectTypeFor,
  withProjectContext,
  type ProjectProfile,
} from './classification/project_analyzer.js';
export { RuleSelector, classificationTags, type SelectionRequest } from './selection/rule_selector.js';
export { PlanGenerator, parseClassification } from './planning/plan_generator.js';
export * from './knowledge/index.js';

// ============================================================================
// BACKEND
// ============================================================================

export * from './adapters/index.js';

// ============================================================================
// CONFIGURATION, ERRORS, RESULTS
// ============================================================================

export {
  loadConfig,
  parseConfig,
  DEFAULT_CONFIG_FILE,
  RuleweaverConfigSchema,
  type RuleweaverConfig,
  type LoadConfigOptions,
} from './config/index.js';
export * from './core/index.js';

// ============================================================================
// MCP
// ============================================================================

export {
  RuleweaverMCPServer,
  RESOURCE_URIS,
  startStdioServer,
  TOOL_INPUT_SCHEMAS,
  validateToolInput,
  type ToolName,
} from './mcp/index.js';

export { RULEWEAVER_VERSION } from './version.js';
