/**
 * @fileoverview Detailed help text for ruleweaver CLI commands
 */

const TASK_CONTEXT_OPTIONS = `
TASK CONTEXT:
    --tech <list>           Comma-separated tech stack (e.g. python,fastapi)
    --file <path>           File the task is about
    --project-type <type>   Project type hint (web_app, api_microservices, ...)
    --domain <domain>       Business domain hint
    --project <dir>         Analyse a project directory and add its stack and type`;

const HELP_TEXT = {
  main: `
ruleweaver - rule selection, planning and knowledge lookup for coding agents

USAGE:
    ruleweaver <command> [options]

COMMANDS:
    status                  Backend, knowledge index and rule catalog status
    rules                   List the rule catalog
    select <task>           Classify a task and select its rules
    plan <task>             Build a staged execution plan for a task
    orchestrate <task>      Classification, rules and plan in one step
    analyze [dir]           Detect a project's tech stack and type
    query <question>        Search the knowledge base
    index                   Refresh (or rebuild) the knowledge index
    serve                   Run the MCP server over stdio
    help [command]          Show help for a command

GLOBAL OPTIONS:
    -h, --help              Show help information
    -v, --version           Show version information
    -c, --config <path>     Configuration file (default: ./ruleweaver.config.yaml)
    --json                  Print results and errors as JSON
    --verbose               Show scores and extra detail

ERROR HANDLING:
    With --json, errors are printed as
    { "error": { "code", "message", "retryable", "recoveryHints", "context" } }
    Exit codes: 2 invalid argument, 3 configuration or catalog, 4 not found,
    5 knowledge index, 6 backend, 1 anything else.
`,

  status: `
ruleweaver status - Show backend, knowledge index and rule catalog status

USAGE:
    ruleweaver status [--probe] [--json]

OPTIONS:
    --probe     Probe the reasoning backend now instead of reporting the cached result
`,

  rules: `
ruleweaver rules - List the rule catalog

USAGE:
    ruleweaver rules [--category <category>] [--json]
`,

  select: `
ruleweaver select - Classify a task and select the rules that apply

USAGE:
    ruleweaver select "<task>" [context options] [--json] [--verbose]
${TASK_CONTEXT_OPTIONS}

EXAMPLES:
    ruleweaver select "Implement user authentication with JWT"
    ruleweaver select "Add a new read-only report endpoint" --tech python
`,

  plan: `
ruleweaver plan - Build a staged execution plan for a task

USAGE:
    ruleweaver plan "<task>" [context options] [--json]
${TASK_CONTEXT_OPTIONS}
`,

  orchestrate: `
ruleweaver orchestrate - Classification, rule selection and plan in one step

USAGE:
    ruleweaver orchestrate "<task>" [context options] [--json] [--verbose]
${TASK_CONTEXT_OPTIONS}
`,

  analyze: `
ruleweaver analyze - Detect the tech stack and project type of a directory

USAGE:
    ruleweaver analyze [dir] [--json]

Languages come from file extensions, frameworks from dependency manifests
(package.json, requirements.txt, go.mod, ...). The directory defaults to the
current one.
`,

  query: `
ruleweaver query - Search the knowledge base

USAGE:
    ruleweaver query "<question>" [--k N] [--answer] [--json]

OPTIONS:
    --k N       Number of passages to return (default from configuration, 5)
    --answer    Ask the reasoning backend to answer from the passages
`,

  index: `
ruleweaver index - Refresh the knowledge index from the knowledge directory

USAGE:
    ruleweaver index [--rebuild] [--json]

OPTIONS:
    --rebuild   Drop the index and re-embed every document
`,

  serve: `
ruleweaver serve - Run the MCP server over stdio

USAGE:
    ruleweaver serve [--config <path>]

Tools: select_rules, generate_plan, orchestrate_task, analyze_project,
query_knowledge, get_status, reload_rules.
Resources: ruleweaver://rules, ruleweaver://knowledge/index, ruleweaver://status.
Prompts: orchestrate_task, analyze_code.
`,
};

export type HelpTopic = keyof typeof HELP_TEXT;

function isHelpTopic(command: string): command is HelpTopic {
  return Object.prototype.hasOwnProperty.call(HELP_TEXT, command);
}

export function showHelp(command?: string): void {
  console.log(getCommandHelp(command));
}

export function getCommandHelp(command?: string): string {
  if (!command) return HELP_TEXT.main;
  if (isHelpTopic(command)) return HELP_TEXT[command];
  return `Unknown command: ${command}\n${HELP_TEXT.main}`;
}
