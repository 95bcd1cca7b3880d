import * as path from 'path';
import { withOrchestrator, type CommandInput } from '../context.js';
import { printJson, printFields } from '../render.js';

export async function analyzeCommand(input: CommandInput): Promise<void> {
  const directory = path.resolve(input.cwd, input.args[0] ?? '.');

  await withOrchestrator(input, {}, async (orchestrator) => {
    const result = await orchestrator.analyzeProject(directory);
    if (input.json) {
      printJson(result);
      return;
    }
    const { profile } = result;
    console.log(`Project: ${profile.root}`);
    printFields([
      ['Project Type', profile.projectType],
      ['Tech Stack', profile.techStack.join(', ') || null],
      ['Frameworks', profile.frameworks.join(', ') || null],
      ['Source Files', profile.truncated ? `${profile.filesAnalyzed} (truncated)` : profile.filesAnalyzed],
      ['Lines', profile.linesEstimated],
    ]);
  });
}
