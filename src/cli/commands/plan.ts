import {
  parseTaskContext,
  requireText,
  taskRequestOptions,
  withOrchestrator,
  type CommandInput,
} from '../context.js';
import { printJson, printStages } from '../render.js';

export async function planCommand(input: CommandInput): Promise<void> {
  const task = requireText(input, 'task', 'ruleweaver plan "<task>"');
  const context = parseTaskContext(input.flags);

  await withOrchestrator(input, { refresh: true }, async (orchestrator) => {
    const plan = await orchestrator.generatePlan(task, context, taskRequestOptions(input));
    if (input.json) {
      printJson(plan);
      return;
    }
    printStages(plan.template, plan.stages);
    console.log(`\nMode: ${plan.mode}`);
  });
}
