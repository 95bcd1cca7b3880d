import type { RefreshReport } from '../../knowledge/knowledge_index.js';
import { withOrchestrator, type CommandInput } from '../context.js';
import { createError } from '../errors.js';
import { formatElapsed, printJson, printFields } from '../render.js';

export async function indexCommand(input: CommandInput): Promise<void> {
  await withOrchestrator(input, {}, async (orchestrator) => {
    const report: RefreshReport | null = input.flags.rebuild
      ? await orchestrator.rebuildKnowledge()
      : await orchestrator.refreshKnowledge();
    if (!report) {
      const error = orchestrator.getStatus().index.lastRefreshError ?? 'unknown error';
      throw createError('INDEX_FAILED', `Knowledge refresh failed: ${error}`);
    }
    const stats = orchestrator.getStatus().index;

    if (input.json) {
      printJson({ report, index: stats });
      return;
    }

    const durationMs = Date.parse(report.completedAt) - Date.parse(report.startedAt);
    console.log(input.flags.rebuild ? 'Knowledge index rebuilt' : 'Knowledge index refreshed');
    printFields([
      ['Added', report.added.length],
      ['Updated', report.updated.length],
      ['Removed', report.removed.length],
      ['Unchanged', report.unchanged.length],
      ['Failed', report.failed.length],
      ['Documents', stats.documents],
      ['Chunks', stats.chunks],
      ['Duration', formatElapsed(durationMs)],
    ]);
    for (const failure of report.failed) {
      console.log(`  ! ${failure.documentId}: ${failure.error}`);
    }
  });
}
