import type { Express } from 'express';
import type { Server } from 'node:http';

const SHUTDOWN_GRACE_MS = 10000;

interface StartServerOptions {
  app: Express;
  port: string | number;
}

export const startServer = ({ app, port }: StartServerOptions): Server => {
  const server = app.listen(port, () => console.log(`[Server] Wind conditions API listening on ${port}`));

  const shutdown = (signal: string) => {
    console.log(`[Server] ${signal} received, closing listener`);
    server.close((err) => {
      if (err) {
        console.error('[Server] Close failed:', err);
        process.exit(1);
      }
      process.exit(0);
    });

    setTimeout(() => {
      console.error('[Server] Listener still open after 10s, exiting');
      process.exit(1);
    }, SHUTDOWN_GRACE_MS).unref();
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('unhandledRejection', (reason) => {
    console.error('[Server] Unhandled rejection:', reason);
  });
  process.on('uncaughtException', (error) => {
    console.error('[Server] Uncaught exception:', error);
    shutdown('uncaughtException');
  });

  return server;
};
