import 'dotenv/config';
import http from 'http';

import { createApp } from './app';

async function bootstrap(): Promise<void> {
  try {
    const { app, settings, jobStore } = await createApp();
    const server = http.createServer(app);

    const shutdown = (): void => {
      server.close();
      jobStore.dispose().then(
        () => process.exit(0),
        (error: unknown) => {
          const message = error instanceof Error ? error.message : 'Unknown cleanup error';
          // eslint-disable-next-line no-console
          console.error('Failed to remove staged uploads:', message);
          process.exit(1);
        }
      );
    };

    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);

    server.listen(settings.port, () => {
      // eslint-disable-next-line no-console
      console.log(`Document conversion front-end listening on port ${settings.port}`);
      const url = `http://${settings.host}:${settings.port}/`;
      // eslint-disable-next-line no-console
      console.log(`Open ${url}`);
    });
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown startup error';
    // eslint-disable-next-line no-console
    console.error('Failed to start server:', message);
    process.exit(1);
  }
}

void bootstrap();
