import * as path from 'node:path';
import { createLogger, loadConfig, resolveSecrets } from '@parley/core';
import { bootstrap } from './bootstrap.js';

async function main(): Promise<void> {
  const configPath = process.env['PARLEY_CONFIG'] ?? path.resolve(process.cwd(), 'config/default.json5');

  const result = loadConfig(configPath, process.env);
  if (!result.valid || !result.config) {
    const errorMessages = result.errors.map((e) => `${e.path}: ${e.message}`).join('; ');
    throw new Error(`Invalid configuration: ${errorMessages}`);
  }
  const config = result.config;
  const logger = createLogger({ level: config.logging.level });

  const app = await bootstrap({ config, secrets: resolveSecrets(config, process.env), logger });

  const handleShutdown = (signal: string): void => {
    logger.info({ signal }, 'signal received');
    app.shutdown().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error({ err: String(err) }, 'shutdown failed');
        process.exit(1);
      },
    );
  };

  process.on('SIGINT', handleShutdown);
  process.on('SIGTERM', handleShutdown);

  logger.info({ port: app.port }, 'parley running');
}

main().catch((err: unknown) => {
  console.error('Fatal:', err);
  process.exit(1);
});
