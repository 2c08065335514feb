/**
 * Process entry point: load configuration, listen, shut down on signals
 */

import { ConfigError, loadConfig, startServer, type AppConfig } from './index.js';

function readConfig(): AppConfig {
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      process.stderr.write(`${error.message}\n`);
      process.exit(1);
    }
    throw error;
  }
}

async function main(): Promise<void> {
  const server = await startServer(readConfig());

  const shutdown = (signal: NodeJS.Signals) => {
    server.log.info({ signal }, 'Shutting down');
    server.close().then(
      () => process.exit(0),
      (err: unknown) => {
        server.log.error({ err }, 'Shutdown failed');
        process.exit(1);
      }
    );
  };

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

main().catch((err: unknown) => {
  process.stderr.write(`Failed to start server: ${err instanceof Error ? err.stack ?? err.message : String(err)}\n`);
  process.exit(1);
});
