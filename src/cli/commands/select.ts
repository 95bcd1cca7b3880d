import {
  parseTaskContext,
  requireText,
  taskRequestOptions,
  withOrchestrator,
  type CommandInput,
} from '../context.js';
import { printClassification, printJson, printRules } from '../render.js';

export async function selectCommand(input: CommandInput): Promise<void> {
  const task = requireText(input, 'task', 'ruleweaver select "<task>"');
  const context = parseTaskContext(input.flags);

  await withOrchestrator(input, { refresh: true }, async (orchestrator) => {
    const result = await orchestrator.selectRules(task, context, taskRequestOptions(input));
    if (input.json) {
      printJson(result);
      return;
    }
    printClassification(result.classification, result.classificationMode);
    console.log();
    printRules(result.rules, result.rationale, input.verbose);
    console.log(`\nMode: ${result.mode}`);
  });
}
