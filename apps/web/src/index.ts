/**
 * Web Server Entry Point
 * 
 * Loads configuration, opens storage and serves the upload form.
 */

import '@flightlog/utils/env';
import { loadCredentials, LogStorage } from '@flightlog/upload';
import { logger } from '@flightlog/utils';
import { createServer } from './server.js';
import { parseWebConfig } from './config/index.js';

async function main(): Promise<void> {
  try {
    const config = parseWebConfig(process.env);

    const credentials = await loadCredentials(config.storage.credentialsPath);
    const storage = await LogStorage.initialize(credentials, config.storage.bucket, {
      publicBaseUrl: config.storage.publicBaseUrl,
      createBucket: config.storage.createBucket,
    });

    const server = await createServer({ config, storage });

    // Graceful shutdown
    const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

    for (const signal of signals) {
      process.once(signal, () => {
        logger.info({ signal }, 'Received shutdown signal');

        server.close().then(
          () => {
            logger.info('Server closed gracefully');
            process.exit(0);
          },
          (err: unknown) => {
            logger.error({ err }, 'Error during shutdown');
            process.exit(1);
          },
        );
      });
    }

    await server.listen({
      host: config.host,
      port: config.port,
    });

    logger.info({
      port: config.port,
      bucket: storage.bucket,
      env: config.nodeEnv,
    }, 'Upload form started');

  } catch (err) {
    logger.fatal({ err }, 'Failed to start server');
    process.exit(1);
  }
}

void main();
