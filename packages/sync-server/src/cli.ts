/**
 * CLI for the companion sync server
 */

import { toError } from '@companion/sync';
import { loadServerConfig, parseArgs, toServerConfig } from './config.js';
import { createMemoryPersistence } from './storage/memory-persistence.js';
import { createSyncServer } from './sync-server.js';
import { SERVER_VERSION } from './types.js';

function printHelp(): void {
  console.log(`
Companion Sync Server - real-time cross-device sync

Usage: companion-sync [options]

Options:
  -p, --port <port>              Port to listen on (default: 8080)
  -h, --host <host>              Host to bind to (default: 0.0.0.0)
  --path <path>                  WebSocket path (default: /sync)
  --log-level <level>            debug | info | warn | error (default: info)
  --offline-queue-limit <n>      Queued events kept per offline user (default: 500)
  --client-timeout <ms>          Idle connection timeout (default: 60000)
  --max-clock-skew <ms>          Allowed future skew for event timestamps (default: 300000)
  --debug                        Same as --log-level debug
  --help                         Show this help message
  --version                      Show version

Environment Variables:
  COMPANION_SYNC_PORT, COMPANION_SYNC_HOST, COMPANION_SYNC_PATH,
  COMPANION_SYNC_LOG_LEVEL, COMPANION_SYNC_OFFLINE_QUEUE_LIMIT,
  COMPANION_SYNC_CLIENT_TIMEOUT, COMPANION_SYNC_MAX_CLOCK_SKEW
`);
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));

  if (args.help) {
    printHelp();
    process.exit(0);
  }

  if (args.version) {
    console.log(`companion-sync v${SERVER_VERSION}`);
    process.exit(0);
  }

  const loaded = loadServerConfig(args, process.env);
  if (!loaded.ok) {
    console.error(`Invalid configuration: ${loaded.error}`);
    process.exit(1);
  }

  const server = createSyncServer({
    ...toServerConfig(loaded.settings),
    persistence: createMemoryPersistence(),
  });

  const shutdown = async (): Promise<void> => {
    console.log('\nShutting down...');
    try {
      await server.stop();
      process.exit(0);
    } catch (error) {
      console.error('Failed to stop cleanly:', toError(error).message);
      process.exit(1);
    }
  };

  process.on('SIGINT', () => void shutdown());
  process.on('SIGTERM', () => void shutdown());

  try {
    await server.start();

    const { host, port, path } = loaded.settings;
    console.log(`Companion sync server listening on ws://${host}:${port}${path}`);
    console.log('Press Ctrl+C to stop');
  } catch (error) {
    console.error('Failed to start server:', toError(error).message);
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  console.error(toError(error).message);
  process.exit(1);
});
