import process from 'node:process';
import { pathToFileURL } from 'node:url';

import { createApplication } from './application';

export { createApplication } from './application';

const entry = process.argv[1];

if (entry && import.meta.url === pathToFileURL(entry).href) {
  bootstrap().catch((error: unknown) => {
    console.error('Failed to start WhatsApp relay', error);
    process.exitCode = 1;
  });
}

async function bootstrap(): Promise<void> {
  const app = await createApplication();

  await app.start();
  app.logger.info({ port: app.config.port }, 'WhatsApp relay started');

  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    app.logger.info({ signal }, 'Shutting down WhatsApp relay');
    try {
      await app.stop();
      app.logger.info('Shutdown complete');
    } catch (error) {
      app.logger.error({ err: error }, 'Error during shutdown');
    } finally {
      process.exit(0);
    }
  };

  process.on('SIGINT', (signal) => void shutdown(signal));
  process.on('SIGTERM', (signal) => void shutdown(signal));
}
