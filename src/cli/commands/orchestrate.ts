import {
  parseTaskContext,
  requireText,
  taskRequestOptions,
  withOrchestrator,
  type CommandInput,
} from '../context.js';
import { printClassification, printJson, printRules, printStages } from '../render.js';

export async function orchestrateCommand(input: CommandInput): Promise<void> {
  const task = requireText(input, 'task', 'ruleweaver orchestrate "<task>"');
  const context = parseTaskContext(input.flags);

  await withOrchestrator(input, { refresh: true }, async (orchestrator) => {
    const result = await orchestrator.orchestrate(task, context, taskRequestOptions(input));
    if (input.json) {
      printJson(result);
      return;
    }
    printClassification(result.classification, result.modes.classification);
    console.log();
    printRules(result.rules, result.rationale, input.verbose);
    console.log();
    printStages(result.plan.template, result.plan.stages);
    console.log(`\nMode: ${result.mode}`);
  });
}
