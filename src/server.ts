import { createApp } from './app';
import { config } from './config';
import pool from './config/database';
import { initializeDatabase } from './config/init-db';
import { createPgStoreProvider } from './store/pgStore';

const app = createApp({
  storeProvider: createPgStoreProvider(pool),
  branding: config.branding,
  rateLimit: config.rateLimit,
});

const startServer = async () => {
  try {
    await initializeDatabase(pool);

    const server = app.listen(config.port, () => {
      console.log(`Server running on port ${config.port}`);
    });

    const shutdown = (signal: string) => {
      console.log(`${signal} received, shutting down...`);
      server.close(() => {
        pool.end().then(
          () => process.exit(0),
          (error) => {
            console.error('Failed to close database pool:', error);
            process.exit(1);
          }
        );
      });
    };

    process.on('SIGTERM', () => shutdown('SIGTERM'));
    process.on('SIGINT', () => shutdown('SIGINT'));
  } catch (error) {
    console.error('Failed to start server:', error);
    process.exit(1);
  }
};

void startServer();
