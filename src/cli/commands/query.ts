import { parsePositiveInt, requireText, withOrchestrator, type CommandInput } from '../context.js';
import { printJson } from '../render.js';

const PREVIEW_CHARS = 240;

export async function queryCommand(input: CommandInput): Promise<void> {
  const question = requireText(input, 'question', 'ruleweaver query "<question>" [--k N] [--answer]');
  const k = parsePositiveInt(input.flags.k, '--k');

  await withOrchestrator(input, { refresh: true }, async (orchestrator) => {
    const response = await orchestrator.queryKnowledge(question, k, { summarize: input.flags.answer });
    if (input.json) {
      printJson(response);
      return;
    }

    if (response.results.length === 0) {
      console.log('No matching knowledge. Add documents to the knowledge directory and run `ruleweaver index`.');
      return;
    }
    response.results.forEach((result, index) => {
      const preview = result.text.length > PREVIEW_CHARS
        ? `${result.text.slice(0, PREVIEW_CHARS)}...`
        : result.text;
      console.log(`[${index + 1}] ${result.sourceId} #${result.sequenceIndex} (score ${result.score.toFixed(3)})`);
      console.log(`    ${preview.replace(/\s+/g, ' ')}`);
    });
    console.log(`\nConfidence: ${response.confidence.toFixed(3)}`);
    if (response.answer !== undefined) {
      console.log(`\nAnswer (${response.mode}):\n${response.answer}`);
    }
  });
}
