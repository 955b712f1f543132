/**
 * Headless executor: a CommandExecutor over one in-memory document.
 *
 * Lets the MCP server run live tool calls without Fusion 360, e.g.
 *   npm run executor -- --port=9876 --log-level=debug
 */

import { createLogger, loadConfig } from '@cadlink/protocol';
import { CommandExecutor } from './executor.js';
import { MemoryDocumentHost } from './memory-document.js';

const config = loadConfig();
const logger = createLogger('executor', { level: config.logLevel });

const documents = new MemoryDocumentHost();
documents.open('Headless');

const executor = new CommandExecutor({
  host: config.host,
  port: config.port,
  documents,
  logger,
});

await executor.start();

async function shutdown(signal: string): Promise<void> {
  logger.info(`${signal} received, shutting down`);
  await executor.stop();
  process.exit(0);
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    shutdown(signal).catch((err: unknown) => {
      logger.error(`Shutdown failed: ${err instanceof Error ? err.message : String(err)}`);
      process.exit(1);
    });
  });
}
