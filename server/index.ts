import dotenv from 'dotenv';
dotenv.config();

import { createApp } from './app.js';
import { loadAppConfig } from './config/app-config.js';
import { errorMessage } from './errors.js';
import { createServices } from './services.js';

async function main(): Promise<void> {
  const config = loadAppConfig();
  const services = createServices(config);
  const app = createApp(services);

  const server = app.listen(config.port, '0.0.0.0', () => {
    console.log(`[express] serving on port ${config.port}`);
  });

  const shutdown = (signal: string) => {
    console.log(`🛑 [Server] ${signal} received, shutting down`);
    server.close(() => {
      services
        .close()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          console.error('❌ [Server] Shutdown failed:', errorMessage(error));
          process.exit(1);
        });
    });
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((error: unknown) => {
  console.error('❌ [Server] Failed to start:', errorMessage(error));
  process.exit(1);
});
