/**
 * @fileoverview MCP server
 *
 * Exposes the orchestration facade to MCP clients over stdio.
 *
 * Tools: select_rules, generate_plan, orchestrate_task, analyze_project,
 * query_knowledge, get_status, reload_rules.
 * Resources: ruleweaver://rules, ruleweaver://knowledge/index,
 * ruleweaver://status.
 * Prompts: orchestrate_task, analyze_code.
 *
 * @packageDocumentation
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  GetPromptRequestSchema,
  ListPromptsRequestSchema,
  ListResourcesRequestSchema,
  ListToolsRequestSchema,
  ReadResourceRequestSchema,
  type CallToolResult,
  type GetPromptResult,
  type ListPromptsResult,
  type ListResourcesResult,
  type ListToolsResult,
  type Prompt,
  type ReadResourceResult,
  type Resource,
  type Tool,
} from '@modelcontextprotocol/sdk/types.js';
import { NotFoundError, ValidationError, getErrorMessage } from '../core/errors.js';
import { createOrchestrator } from '../orchestrator/bootstrap.js';
import type {
  OrchestrateResponse,
  OrchestrationFacade,
  SelectedRule,
} from '../orchestrator/orchestration_facade.js';
import { TaskContextSchema, type TaskContext } from '../types.js';
import { logDebug, logError, logInfo } from '../telemetry/logger.js';
import { RULEWEAVER_VERSION } from '../version.js';
import {
  AnalyzeCodePromptArgsSchema,
  AnalyzeProjectInputSchema,
  formatIssues,
  GeneratePlanInputSchema,
  GetStatusInputSchema,
  isPromptName,
  isToolName,
  OrchestrateTaskInputSchema,
  OrchestrateTaskPromptArgsSchema,
  QueryKnowledgeInputSchema,
  ReloadRulesInputSchema,
  SelectRulesInputSchema,
  validateToolInput,
  type PromptName,
  type ToolName,
} from './schema.js';

// ============================================================================
// CONSTANTS
// ============================================================================

export const RESOURCE_URIS = {
  rules: 'ruleweaver://rules',
  knowledgeIndex: 'ruleweaver://knowledge/index',
  status: 'ruleweaver://status',
} as const;

const CONTEXT_PROPERTY = {
  type: 'object',
  description: 'Execution context hints such as tech_stack, file_path, project_type or domain',
  additionalProperties: {
    anyOf: [{ type: 'string' }, { type: 'array', items: { type: 'string' } }],
  },
};

const PROJECT_DIR_PROPERTY = {
  type: 'string',
  description: 'Project directory whose detected stack is merged into the context',
};

const TOOLS: Tool[] = [
  {
    name: 'select_rules',
    description: 'Classify a task and return the ordered rules that apply to it',
    inputSchema: {
      type: 'object',
      properties: {
        task: { type: 'string', description: 'Task description' },
        context: CONTEXT_PROPERTY,
        project_dir: PROJECT_DIR_PROPERTY,
      },
      required: ['task'],
    },
  },
  {
    name: 'generate_plan',
    description: 'Build a staged execution plan with quality gates for a task',
    inputSchema: {
      type: 'object',
      properties: {
        task: { type: 'string', description: 'Task description' },
        context: CONTEXT_PROPERTY,
        project_dir: PROJECT_DIR_PROPERTY,
      },
      required: ['task'],
    },
  },
  {
    name: 'orchestrate_task',
    description: 'Classification, rule selection and plan for a task in one call',
    inputSchema: {
      type: 'object',
      properties: {
        task: { type: 'string', description: 'Task description' },
        context: CONTEXT_PROPERTY,
        project_dir: PROJECT_DIR_PROPERTY,
      },
      required: ['task'],
    },
  },
  {
    name: 'analyze_project',
    description: 'Detect the technology stack and project type of a directory',
    inputSchema: {
      type: 'object',
      properties: {
        path: { type: 'string', description: 'Project directory' },
      },
      required: ['path'],
    },
  },
  {
    name: 'query_knowledge',
    description: 'Search the knowledge base for passages relevant to a question',
    inputSchema: {
      type: 'object',
      properties: {
        question: { type: 'string', description: 'Question to search for' },
        k: { type: 'number', description: 'Number of passages (default 5)' },
        answer: { type: 'boolean', description: 'Also answer the question from the passages' },
      },
      required: ['question'],
    },
  },
  {
    name: 'get_status',
    description: 'Backend reachability, knowledge index freshness and rule catalog version',
    inputSchema: {
      type: 'object',
      properties: {
        probe: { type: 'boolean', description: 'Probe the backend now' },
      },
      required: [],
    },
  },
  {
    name: 'reload_rules',
    description: 'Re-read rule definitions and swap the catalog',
    inputSchema: { type: 'object', properties: {}, required: [] },
  },
];

const RESOURCES: Resource[] = [
  {
    uri: RESOURCE_URIS.rules,
    name: 'Rule catalog',
    description: 'Every rule with its category, tags and mandatory flag',
    mimeType: 'application/json',
  },
  {
    uri: RESOURCE_URIS.knowledgeIndex,
    name: 'Knowledge index',
    description: 'Indexed document ids and index statistics',
    mimeType: 'application/json',
  },
  {
    uri: RESOURCE_URIS.status,
    name: 'Status',
    description: 'Backend, index and catalog status',
    mimeType: 'application/json',
  },
];

const PROMPTS: Prompt[] = [
  {
    name: 'orchestrate_task',
    description: 'Create a task orchestration plan with the rules that apply',
    arguments: [
      { name: 'task', description: 'The task to orchestrate', required: true },
      { name: 'context', description: 'Additional project context, as text or a JSON object', required: false },
    ],
  },
  {
    name: 'analyze_code',
    description: 'Review code against the rule catalog',
    arguments: [
      { name: 'code', description: 'The code to analyse', required: true },
    ],
  },
];

const CODE_REVIEW_TASK = 'Review existing code for best practices, quality and improvements';

/**
 * Prompt context arrives as a string: a JSON object of hints, or free text
 * kept as the `domain` hint.
 */
export function parsePromptContext(raw: string | undefined): TaskContext {
  const text = raw?.trim();
  if (!text) return {};
  if (text.startsWith('{')) {
    const parsed = TaskContextSchema.safeParse(parseJson(text));
    if (parsed.success) return parsed.data;
  }
  return { domain: text };
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    logDebug('Prompt context is not JSON', { error: getErrorMessage(error) });
    return undefined;
  }
}

function describeArgument(value: string | undefined): string {
  return value === undefined ? 'nothing' : `${value.length} characters`;
}

function ruleLines(rules: readonly SelectedRule[]): string[] {
  return rules.map((rule) => `- ${rule.id}: ${rule.title}${rule.mandatory ? ' (mandatory)' : ''}`);
}

export function renderOrchestrationPrompt(result: OrchestrateResponse): string {
  const lines = [
    `Task: ${result.task}`,
    `Project type: ${result.classification.projectType}; complexity: ${result.classification.complexity}`,
    '',
    'Follow these rules:',
    ...ruleLines(result.rules),
    '',
    `Plan (${result.plan.template}):`,
  ];
  result.plan.stages.forEach((stage, position) => {
    lines.push(`${position + 1}. ${stage.name}: ${stage.description}`);
    for (const gate of stage.qualityGates) lines.push(`   gate: ${gate}`);
  });
  return lines.join('\n');
}

function jsonResult(result: unknown): CallToolResult {
  return { content: [{ type: 'text', text: JSON.stringify(result, null, 2) }] };
}

function errorResult(message: string): CallToolResult {
  return {
    content: [{ type: 'text', text: JSON.stringify({ error: true, message }) }],
    isError: true,
  };
}

// ============================================================================
// SERVER
// ============================================================================

export interface RuleweaverMCPServerConfig {
  name: string;
  version: string;
}

export const DEFAULT_MCP_SERVER_CONFIG: RuleweaverMCPServerConfig = {
  name: 'ruleweaver',
  version: RULEWEAVER_VERSION.string,
};

export class RuleweaverMCPServer {
  private readonly server: Server;
  private readonly config: RuleweaverMCPServerConfig;
  private transport: StdioServerTransport | null = null;

  constructor(
    private readonly orchestrator: OrchestrationFacade,
    config: Partial<RuleweaverMCPServerConfig> = {},
  ) {
    this.config = { ...DEFAULT_MCP_SERVER_CONFIG, ...config };
    this.server = new Server(
      { name: this.config.name, version: this.config.version },
      { capabilities: { prompts: {}, resources: {}, tools: {} } },
    );
    this.registerHandlers();
  }

  private registerHandlers(): void {
    this.server.setRequestHandler(ListToolsRequestSchema, async (): Promise<ListToolsResult> => {
      return { tools: this.listTools() };
    });

    this.server.setRequestHandler(ListResourcesRequestSchema, async (): Promise<ListResourcesResult> => {
      return { resources: this.listResources() };
    });

    this.server.setRequestHandler(ReadResourceRequestSchema, async (request): Promise<ReadResourceResult> => {
      return this.readResource(request.params.uri);
    });

    this.server.setRequestHandler(ListPromptsRequestSchema, async (): Promise<ListPromptsResult> => {
      return { prompts: this.listPrompts() };
    });

    this.server.setRequestHandler(GetPromptRequestSchema, async (request): Promise<GetPromptResult> => {
      return this.getPrompt(request.params.name, request.params.arguments);
    });

    this.server.setRequestHandler(CallToolRequestSchema, async (request): Promise<CallToolResult> => {
      const { name, arguments: args } = request.params;
      return this.callTool(name, args);
    });
  }

  listTools(): Tool[] {
    return TOOLS;
  }

  listResources(): Resource[] {
    return RESOURCES;
  }

  listPrompts(): Prompt[] {
    return PROMPTS;
  }

  /** Render a prompt. Unknown names and bad arguments throw. */
  async getPrompt(name: string, args: Record<string, string> = {}): Promise<GetPromptResult> {
    if (!isPromptName(name)) throw new NotFoundError('prompt', name);
    const text = await this.renderPrompt(name, args);
    return {
      description: PROMPTS.find((prompt) => prompt.name === name)?.description,
      messages: [{ role: 'user', content: { type: 'text', text } }],
    };
  }

  /**
   * Run a tool. Failures, including invalid input, come back as `isError`
   * results rather than protocol errors.
   */
  async callTool(name: string, args: unknown): Promise<CallToolResult> {
    if (!isToolName(name)) {
      return errorResult(`Unknown tool: ${name}`);
    }
    try {
      return jsonResult(await this.dispatch(name, args));
    } catch (error) {
      const message = getErrorMessage(error);
      logError('MCP tool call failed', { tool: name, error: message });
      return errorResult(message);
    }
  }

  async readResource(uri: string): Promise<ReadResourceResult> {
    let payload: unknown;
    switch (uri) {
      case RESOURCE_URIS.rules:
        payload = {
          version: this.orchestrator.getStatus().catalog.version,
          rules: this.orchestrator.rules().map((rule) => ({
            id: rule.id,
            title: rule.title,
            category: rule.category,
            description: rule.description,
            tags: [...rule.applicabilityTags],
            mandatory: rule.mandatory,
          })),
        };
        break;
      case RESOURCE_URIS.knowledgeIndex:
        payload = {
          ...this.orchestrator.getStatus().index,
          documentIds: this.orchestrator.knowledgeDocuments(),
        };
        break;
      case RESOURCE_URIS.status:
        payload = this.orchestrator.getStatus();
        break;
      default:
        throw new NotFoundError('document', uri);
    }
    return {
      contents: [{ uri, mimeType: 'application/json', text: JSON.stringify(payload, null, 2) }],
    };
  }

  private async renderPrompt(name: PromptName, args: Record<string, string>): Promise<string> {
    switch (name) {
      case 'orchestrate_task': {
        const input = OrchestrateTaskPromptArgsSchema.safeParse(args);
        if (!input.success) throw new ValidationError('task', 'a task of 1 to 4000 characters', describeArgument(args.task));
        const result = await this.orchestrator.orchestrate(input.data.task, parsePromptContext(input.data.context));
        return renderOrchestrationPrompt(result);
      }
      case 'analyze_code': {
        const input = AnalyzeCodePromptArgsSchema.safeParse(args);
        if (!input.success) throw new ValidationError('code', 'non-empty code', describeArgument(args.code));
        const selection = await this.orchestrator.selectRules(CODE_REVIEW_TASK, { domain: 'code review' });
        return [
          'Review the code below for best practices and improvements.',
          'Check it against these rules:',
          ...ruleLines(selection.rules),
          '',
          '```',
          input.data.code,
          '```',
        ].join('\n');
      }
    }
  }

  private async dispatch(name: ToolName, args: unknown): Promise<unknown> {
    switch (name) {
      case 'select_rules': {
        const input = validateToolInput(SelectRulesInputSchema, args);
        if (!input.valid) throw new Error(`Invalid input: ${formatIssues(input.errors)}`);
        return this.orchestrator.selectRules(input.data.task, input.data.context, { projectDir: input.data.project_dir });
      }
      case 'generate_plan': {
        const input = validateToolInput(GeneratePlanInputSchema, args);
        if (!input.valid) throw new Error(`Invalid input: ${formatIssues(input.errors)}`);
        return this.orchestrator.generatePlan(input.data.task, input.data.context, { projectDir: input.data.project_dir });
      }
      case 'orchestrate_task': {
        const input = validateToolInput(OrchestrateTaskInputSchema, args);
        if (!input.valid) throw new Error(`Invalid input: ${formatIssues(input.errors)}`);
        return this.orchestrator.orchestrate(input.data.task, input.data.context, { projectDir: input.data.project_dir });
      }
      case 'analyze_project': {
        const input = validateToolInput(AnalyzeProjectInputSchema, args);
        if (!input.valid) throw new Error(`Invalid input: ${formatIssues(input.errors)}`);
        return this.orchestrator.analyzeProject(input.data.path);
      }
      case 'query_knowledge': {
        const input = validateToolInput(QueryKnowledgeInputSchema, args);
        if (!input.valid) throw new Error(`Invalid input: ${formatIssues(input.errors)}`);
        return this.orchestrator.queryKnowledge(input.data.question, input.data.k, { summarize: input.data.answer });
      }
      case 'get_status': {
        const input = validateToolInput(GetStatusInputSchema, args);
        if (!input.valid) throw new Error(`Invalid input: ${formatIssues(input.errors)}`);
        if (input.data.probe) await this.orchestrator.probeBackend();
        return this.orchestrator.getStatus();
      }
      case 'reload_rules': {
        const input = validateToolInput(ReloadRulesInputSchema, args);
        if (!input.valid) throw new Error(`Invalid input: ${formatIssues(input.errors)}`);
        return this.orchestrator.reload();
      }
    }
  }

  // ==========================================================================
  // LIFECYCLE
  // ==========================================================================

  /** Connect over stdio and start the background knowledge refresh. */
  async start(): Promise<void> {
    this.orchestrator.start();
    this.transport = new StdioServerTransport();
    await this.server.connect(this.transport);
    logInfo('MCP server started', { name: this.config.name, version: this.config.version });
  }

  async stop(): Promise<void> {
    await this.orchestrator.stop();
    if (this.transport) {
      await this.server.close();
      this.transport = null;
    }
    logInfo('MCP server stopped');
  }
}

export interface StartServerOptions {
  configPath?: string;
  cwd?: string;
}

export async function startStdioServer(options: StartServerOptions = {}): Promise<RuleweaverMCPServer> {
  const orchestrator = await createOrchestrator({ configPath: options.configPath, cwd: options.cwd });
  const server = new RuleweaverMCPServer(orchestrator);
  await server.start();
  return server;
}

// ============================================================================
// CLI ENTRY POINT
// ============================================================================

export async function main(): Promise<void> {
  const server = await startStdioServer({ configPath: process.env.RULEWEAVER_CONFIG });

  const shutdown = async (): Promise<void> => {
    await server.stop();
    process.exit(0);
  };
  process.on('SIGINT', () => void shutdown());
  process.on('SIGTERM', () => void shutdown());
}

if (import.meta.url === `file://${process.argv[1]}`) {
  main().catch((error: unknown) => {
    logError('MCP server failed to start', { error: getErrorMessage(error) });
    process.exit(1);
  });
}
