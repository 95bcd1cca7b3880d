#!/usr/bin/env node
/**
 * @fileoverview ruleweaver CLI
 *
 * Commands:
 *   ruleweaver status                 - Backend, knowledge index and catalog status
 *   ruleweaver rules                  - List the rule catalog
 *   ruleweaver select <task>          - Classify a task and select its rules
 *   ruleweaver plan <task>            - Staged execution plan for a task
 *   ruleweaver orchestrate <task>     - Classification, rules and plan together
 *   ruleweaver analyze [dir]          - Detect a project's stack and type
 *   ruleweaver query <question>       - Search the knowledge base
 *   ruleweaver index [--rebuild]      - Refresh the knowledge index
 *   ruleweaver serve                  - Run the MCP server over stdio
 *
 * @packageDocumentation
 */

import { parseArgs } from 'node:util';
import { RULEWEAVER_VERSION } from '../version.js';
import { showHelp } from './help.js';
import { statusCommand } from './commands/status.js';
import { rulesCommand } from './commands/rules.js';
import { selectCommand } from './commands/select.js';
import { planCommand } from './commands/plan.js';
import { orchestrateCommand } from './commands/orchestrate.js';
import { analyzeCommand } from './commands/analyze.js';
import { queryCommand } from './commands/query.js';
import { indexCommand } from './commands/index.js';
import { serveCommand } from './commands/serve.js';
import type { CommandInput } from './context.js';
import {
  classifyError,
  createErrorEnvelope,
  formatErrorJson,
  formatErrorWithHints,
  getExitCode,
  type ErrorEnvelope,
} from './errors.js';

type Command =
  | 'status'
  | 'rules'
  | 'select'
  | 'plan'
  | 'orchestrate'
  | 'analyze'
  | 'query'
  | 'index'
  | 'serve'
  | 'help';

export const COMMANDS: Record<Command, { description: string; usage: string }> = {
  status: {
    description: 'Show backend, knowledge index and rule catalog status',
    usage: 'ruleweaver status [--probe]',
  },
  rules: {
    description: 'List the rule catalog',
    usage: 'ruleweaver rules [--category <category>]',
  },
  select: {
    description: 'Classify a task and select the rules that apply',
    usage: 'ruleweaver select "<task>" [--tech <list>] [--file <path>] [--project <dir>]',
  },
  plan: {
    description: 'Build a staged execution plan for a task',
    usage: 'ruleweaver plan "<task>" [--tech <list>] [--file <path>] [--project <dir>]',
  },
  orchestrate: {
    description: 'Classification, rule selection and plan in one step',
    usage: 'ruleweaver orchestrate "<task>" [--tech <list>] [--file <path>] [--project <dir>]',
  },
  analyze: {
    description: 'Detect the tech stack and project type of a directory',
    usage: 'ruleweaver analyze [dir]',
  },
  query: {
    description: 'Search the knowledge base',
    usage: 'ruleweaver query "<question>" [--k N] [--answer]',
  },
  index: {
    description: 'Refresh the knowledge index',
    usage: 'ruleweaver index [--rebuild]',
  },
  serve: {
    description: 'Run the MCP server over stdio',
    usage: 'ruleweaver serve',
  },
  help: {
    description: 'Show help for a command',
    usage: 'ruleweaver help [command]',
  },
};

function isCommand(value: string): value is Command {
  return Object.prototype.hasOwnProperty.call(COMMANDS, value);
}

/**
 * Output a structured error for agent consumption
 */
function outputStructuredError(envelope: ErrorEnvelope, useJson: boolean): void {
  console.error(useJson ? formatErrorJson(envelope) : formatErrorWithHints(envelope));
}

function stringOption(value: string | boolean | undefined): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

export async function main(argv: string[] = process.argv.slice(2)): Promise<void> {
  const { values, positionals } = parseArgs({
    args: argv,
    options: {
      help: { type: 'boolean', short: 'h', default: false },
      version: { type: 'boolean', short: 'v', default: false },
      config: { type: 'string', short: 'c' },
      json: { type: 'boolean', default: false },
      verbose: { type: 'boolean', default: false },
      tech: { type: 'string' },
      file: { type: 'string' },
      'project-type': { type: 'string' },
      domain: { type: 'string' },
      project: { type: 'string' },
      k: { type: 'string' },
      category: { type: 'string' },
      answer: { type: 'boolean', default: false },
      probe: { type: 'boolean', default: false },
      rebuild: { type: 'boolean', default: false },
    },
    allowPositionals: true,
    strict: false,
  });

  if (values.version === true) {
    console.log(`ruleweaver ${RULEWEAVER_VERSION.string}`);
    return;
  }

  const [command, ...commandArgs] = positionals;
  const jsonMode = values.json === true;

  if (values.help === true || !command || command === 'help') {
    showHelp(command === 'help' ? commandArgs[0] : command);
    return;
  }

  if (!isCommand(command)) {
    const envelope = createErrorEnvelope('INVALID_ARGUMENT', `Unknown command: ${command}`, {
      recoveryHints: [
        `Run 'ruleweaver help' for usage information`,
        `Available commands: ${Object.keys(COMMANDS).join(', ')}`,
      ],
      context: { command },
    });
    outputStructuredError(envelope, jsonMode);
    process.exitCode = getExitCode(envelope);
    return;
  }

  const input: CommandInput = {
    cwd: process.cwd(),
    configPath: stringOption(values.config),
    json: jsonMode,
    verbose: values.verbose === true,
    args: commandArgs,
    flags: {
      tech: stringOption(values.tech),
      file: stringOption(values.file),
      projectType: stringOption(values['project-type']),
      domain: stringOption(values.domain),
      project: stringOption(values.project),
      k: stringOption(values.k),
      category: stringOption(values.category),
      answer: values.answer === true,
      probe: values.probe === true,
      rebuild: values.rebuild === true,
    },
  };

  try {
    switch (command) {
      case 'status':
        await statusCommand(input);
        break;
      case 'rules':
        await rulesCommand(input);
        break;
      case 'select':
        await selectCommand(input);
        break;
      case 'plan':
        await planCommand(input);
        break;
      case 'orchestrate':
        await orchestrateCommand(input);
        break;
      case 'analyze':
        await analyzeCommand(input);
        break;
      case 'query':
        await queryCommand(input);
        break;
      case 'index':
        await indexCommand(input);
        break;
      case 'serve':
        await serveCommand(input);
        break;
    }
  } catch (error) {
    const envelope = classifyError(error);
    envelope.context.command = command;
    outputStructuredError(envelope, jsonMode);
    process.exitCode = getExitCode(envelope);
  }
}

if (import.meta.url === `file://${process.argv[1]}`) {
  main().catch((error: unknown) => {
    const envelope = classifyError(error);
    outputStructuredError(envelope, process.argv.includes('--json'));
    process.exitCode = getExitCode(envelope);
  });
}
