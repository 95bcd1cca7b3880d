/**
 * @fileoverview MCP module: stdio server over the orchestration facade
 *
 * @packageDocumentation
 */

export {
  RuleweaverMCPServer,
  DEFAULT_MCP_SERVER_CONFIG,
  RESOURCE_URIS,
  startStdioServer,
  main,
  type RuleweaverMCPServerConfig,
  type StartServerOptions,
} from './server.js';

export {
  SelectRulesInputSchema,
  GeneratePlanInputSchema,
  OrchestrateTaskInputSchema,
  QueryKnowledgeInputSchema,
  GetStatusInputSchema,
  ReloadRulesInputSchema,
  TOOL_INPUT_SCHEMAS,
  isToolName,
  validateToolInput,
  formatIssues,
  type ToolName,
  type ToolInputIssue,
  type ToolValidationResult,
  type SelectRulesInput,
  type GeneratePlanInput,
  type OrchestrateTaskInput,
  type QueryKnowledgeInput,
  type GetStatusInput,
} from './schema.js';
