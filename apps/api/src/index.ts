/**
 * API Server Entry Point
 * 
 * Local export server for the dataset cutter UI:
 * - Clip export with the transcode fallback ladder
 * - Undo of the last exports
 * - Settings, labels and dataset statistics
 */

import { loadConfig } from './config/index.js';
import { createContext } from './lib/context.js';
import { logger } from './lib/logger.js';
import { createServer } from './server.js';

async function main(): Promise<void> {
  try {
    const config = loadConfig();
    logger.level = config.logLevel;

    const context = await createContext({
      dataDir: config.dataDir,
      videosDir: config.videosDir,
      datasetRoot: config.datasetRoot,
      ffmpegPath: config.ffmpegPath,
      ffprobePath: config.ffprobePath,
      frameRate: config.frameRate,
      audio: config.audio,
      hardwareEncoder: config.hardwareEncoder,
      alwaysReencode: config.alwaysReencode,
      logger,
    });
    const server = await createServer(context);

    // Graceful shutdown
    const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

    for (const signal of signals) {
      process.on(signal, () => {
        logger.info({ signal }, 'Received shutdown signal');

        server.close().then(
          () => {
            logger.info('Server closed gracefully');
            process.exit(0);
          },
          (err: unknown) => {
            logger.error({ err }, 'Error during shutdown');
            process.exit(1);
          }
        );
      });
    }

    // Start server
    await server.listen({
      host: config.host,
      port: config.port,
    });

    logger.info({
      port: config.port,
      env: config.nodeEnv,
      ffmpeg: config.ffmpegPath,
      ffprobe: config.ffprobePath,
    }, 'API server started');

  } catch (err) {
    logger.fatal({ err }, 'Failed to start server');
    process.exit(1);
  }
}

void main();
