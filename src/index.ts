import { buildApp } from './app.js';
import { env } from './config/env.js';
import { pool, connectDatabase, closeDatabase } from './config/database.js';
import { createServices } from './services/index.js';
import { createS3Client } from './services/storage.js';
import { logger } from './utils/logger.js';

async function main() {
  try {
    // Connect to database
    await connectDatabase();

    const s3 = createS3Client({
      endpoint: env.MINIO_ENDPOINT,
      region: env.MINIO_REGION,
      accessKeyId: env.MINIO_ACCESS_KEY,
      secretAccessKey: env.MINIO_SECRET_KEY,
    });

    const services = createServices({
      pool,
      s3,
      bucket: env.UPLOAD_BUCKET,
      storageTimeoutMs: env.STORAGE_TIMEOUT_MS,
      importTimeoutMs: env.IMPORT_TIMEOUT_MS,
      maxUploadBytes: env.MAX_UPLOAD_BYTES,
    });

    // Storage being down is not fatal: uploads still import, mirroring is reported as failed
    if (!(await services.storage.healthCheck())) {
      logger.warn({ endpoint: env.MINIO_ENDPOINT, bucket: env.UPLOAD_BUCKET }, 'Object storage not reachable at startup');
    }

    // Build and start server
    const app = await buildApp(services);

    await app.listen({
      port: env.PORT,
      host: env.HOST,
    });

    logger.info(
      {
        port: env.PORT,
        env: env.NODE_ENV,
        docs: `http://localhost:${env.PORT}/documentation`,
      },
      'CSV import service started'
    );

    // Graceful shutdown
    const shutdown = async (signal: string) => {
      logger.info({ signal }, 'Shutting down...');

      await app.close();
      s3.destroy();
      await closeDatabase();

      logger.info('Shutdown complete');
      process.exit(0);
    };

    const onSignal = (signal: string) => {
      shutdown(signal).catch((error) => {
        logger.error({ error }, 'Shutdown failed');
        process.exit(1);
      });
    };

    process.on('SIGTERM', () => onSignal('SIGTERM'));
    process.on('SIGINT', () => onSignal('SIGINT'));

  } catch (error) {
    logger.fatal({ error }, 'Failed to start server');
    process.exit(1);
  }
}

void main();
