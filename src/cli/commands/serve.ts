import { RuleweaverMCPServer } from '../../mcp/server.js';
import { openOrchestrator, type CommandInput } from '../context.js';

/**
 * Runs until SIGINT/SIGTERM. stdout carries the MCP stream, so nothing else
 * is printed there.
 */
export async function serveCommand(input: CommandInput): Promise<void> {
  const orchestrator = await openOrchestrator(input);
  const server = new RuleweaverMCPServer(orchestrator);
  await server.start();

  await new Promise<void>((resolve, reject) => {
    const shutdown = (): void => {
      server.stop().then(resolve, reject);
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
  });
}
