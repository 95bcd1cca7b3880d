import { RULEWEAVER_VERSION } from '../../version.js';
import { withOrchestrator, type CommandInput } from '../context.js';
import { formatInstant, printJson, printFields } from '../render.js';

export async function statusCommand(input: CommandInput): Promise<void> {
  await withOrchestrator(input, { refresh: true }, async (orchestrator) => {
    if (input.flags.probe) {
      await orchestrator.probeBackend();
    }
    const status = orchestrator.getStatus();

    if (input.json) {
      printJson({ version: RULEWEAVER_VERSION.string, ...status });
      return;
    }

    console.log('Ruleweaver Status');
    console.log('=================\n');

    console.log('Reasoning Backend:');
    printFields([
      ['Configured', status.backend.configured],
      ['Provider', status.backend.provider],
      ['Model', status.backend.model || null],
      ['Reachable', status.backend.configured ? status.backend.reachable : null],
      ['Last Checked', formatInstant(status.backend.lastCheckedAt)],
    ]);
    if (status.backend.error) {
      printFields([['Error', status.backend.error]]);
    }
    if (!status.backend.configured) {
      console.log('  Selection and planning use keyword heuristics (mode: fallback).');
    }
    console.log();

    console.log('Knowledge Index:');
    printFields([
      ['Documents', status.index.documents],
      ['Chunks', status.index.chunks],
      ['Embedding', status.index.embeddingVersion],
      ['Last Refresh', formatInstant(status.index.lastSuccessfulRefreshAt)],
    ]);
    if (status.index.lastRefreshError) {
      printFields([['Refresh Error', status.index.lastRefreshError]]);
    }
    console.log();

    console.log('Rule Catalog:');
    printFields([
      ['Version', status.catalog.version],
      ['Rules', status.catalog.rules],
      ['Mandatory', status.catalog.mandatory.join(', ') || null],
      ['Source', status.catalog.source],
    ]);
  });
}
