import { existsSync } from 'fs';
import { loadConfig, loadConfigFromEnv, mergeConfig, toAuthOptions, toReaderOptions } from './config/index.js';
import { createLogger } from './logger.js';
import { openDatabase } from './db/index.js';
import { SqliteEmployeeDirectory, seedEmployees } from './directory/index.js';
import { AuthenticationService } from './auth/index.js';
import { ReaderSession } from './reader/index.js';
import { NodeHidBackend } from './reader/node-hid.js';
import { KioskStation } from './station/index.js';
import { serializeAuthResult } from './server/serialize.js';
import { createKioskServer } from './server/index.js';

const CONFIG_PATH = process.env.CONFIG_PATH || './config/kiosk.yaml';

async function main() {
  // Load configuration from file, then override with environment variables
  const config = mergeConfig(loadConfig(CONFIG_PATH), loadConfigFromEnv());

  const logger = createLogger(config.logging);
  logger.info({ station: config.station.name }, 'Starting badge kiosk...');
  logger.info({ configPath: CONFIG_PATH }, 'Configuration loaded');

  // Initialize database
  logger.info({ dbPath: config.storage.path }, 'Initializing database');
  const database = openDatabase(config.storage.path);

  // Import employees from the seed file, if one is configured
  const seedFile = config.storage.seed_file;
  if (seedFile && existsSync(seedFile)) {
    const { imported, errors } = seedEmployees(database.db, seedFile);
    for (const { entry, error } of errors) {
      logger.warn({ seedFile, entry, error }, 'Skipped invalid employee seed entry');
    }
    logger.info({ seedFile, imported, skipped: errors.length }, 'Employee seed imported');
  } else if (seedFile) {
    logger.warn({ seedFile }, 'Employee seed file not found');
  }

  const directory = new SqliteEmployeeDirectory(database.db, config.station.name, logger);
  const auth = new AuthenticationService({
    directory,
    logger,
    options: toAuthOptions(config.auth),
  });
  const reader = new ReaderSession({
    backend: new NodeHidBackend(),
    logger,
    options: toReaderOptions(config.reader),
  });
  const station = new KioskStation({ reader, auth, logger });

  station.startMonitoring(
    (outcome) => {
      logger.debug({ cardId: outcome.scan.cardId, result: serializeAuthResult(outcome.result) }, 'Scan processed');
    },
    (status) => {
      logger.info({ state: status.state, lastError: status.lastError }, 'Card reader status changed');
    }
  );

  if (config.reader.auto_connect) {
    const result = await station.connect();
    if (!result.ok) {
      // the UI can retry through /api/reader/connect
      logger.warn({ code: result.error.code, error: result.error.message }, 'Card reader not available at start-up');
    }
  }

  // Create and start HTTP server
  const server = await createKioskServer({
    station,
    auth,
    directory,
    stationName: config.station.name,
    logger,
  });

  // Graceful shutdown
  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, 'Shutting down...');

    await station.stopMonitoring();
    await station.disconnect();
    auth.logout();

    await server.close();
    logger.info('HTTP server closed');

    database.close();
    logger.info('Resources cleaned up');

    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((err) => {
      logger.error({ err }, 'Shutdown failed');
      process.exit(1);
    });
  };
  process.on('SIGTERM', () => onSignal('SIGTERM'));
  process.on('SIGINT', () => onSignal('SIGINT'));

  // Start server
  const { listen_port: port, host } = config.server;
  await server.listen({ port, host });

  logger.info({ port, host }, 'Kiosk server started');
}

// Handle uncaught errors
process.on('uncaughtException', (err) => {
  console.error('Uncaught exception:', err);
  process.exit(1);
});

process.on('unhandledRejection', (reason, promise) => {
  console.error('Unhandled rejection at:', promise, 'reason:', reason);
});

main().catch((err) => {
  console.error('Failed to start:', err);
  process.exit(1);
});
