import 'dotenv/config';
import http from 'http';

import { createApp } from './app';
import { loadSettings } from './config/settings';

async function bootstrap(): Promise<void> {
  try {
    const settings = loadSettings();
    const { app, orchestrator } = await createApp({ settings });
    const server = http.createServer(app);

    server.listen(settings.port, settings.host, () => {
      // eslint-disable-next-line no-console
      console.log(`Video to audio converter listening on http://${settings.host}:${settings.port}/`);
    });

    const shutdown = async (): Promise<void> => {
      // eslint-disable-next-line no-console
      console.log('\nShutting down converter...');
      if (orchestrator.cancel()) {
        // eslint-disable-next-line no-console
        console.log('Waiting for the file in progress to finish...');
      }

      await orchestrator.waitForIdle();
      server.close(() => process.exit(0));
    };

    process.once('SIGINT', () => void shutdown());
    process.once('SIGTERM', () => void shutdown());
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown startup error';
    // eslint-disable-next-line no-console
    console.error('Failed to start server:', message);
    process.exit(1);
  }
}

void bootstrap();
