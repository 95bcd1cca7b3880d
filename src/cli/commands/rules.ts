import { RuleCategorySchema } from '../../types.js';
import { withOrchestrator, type CommandInput } from '../context.js';
import { createError } from '../errors.js';
import { printJson, printColumns } from '../render.js';

export async function rulesCommand(input: CommandInput): Promise<void> {
  let category: string | undefined;
  if (input.flags.category !== undefined) {
    const parsed = RuleCategorySchema.safeParse(input.flags.category);
    if (!parsed.success) {
      throw createError('INVALID_ARGUMENT', `Unknown category "${input.flags.category}"`, {
        categories: RuleCategorySchema.options,
      });
    }
    category = parsed.data;
  }

  await withOrchestrator(input, {}, async (orchestrator) => {
    const rules = orchestrator.rules().filter((rule) => !category || rule.category === category);

    if (input.json) {
      printJson(rules);
      return;
    }

    printColumns(
      ['ID', 'Category', 'Mandatory', 'Title'],
      rules.map((rule) => [rule.id, rule.category, rule.mandatory ? 'yes' : '', rule.title]),
    );
    if (input.verbose) {
      for (const rule of rules) {
        console.log(`\n${rule.id}: ${rule.description}`);
        console.log(`  tags: ${rule.applicabilityTags.join(', ')}`);
      }
    }
  });
}
