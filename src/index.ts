import 'dotenv/config';

import { loadConfig } from './config.js';
import { createAppServices } from './composition.js';
import { createApp } from './app.js';

const config = loadConfig();
const services = createAppServices(config);
const app = createApp(services);

const server = app.listen(config.port, () => console.log(`Listening on port ${config.port}`));

function shutdown(signal: string) {
  console.log(`[Server] ${signal} received, closing`);
  server.close(() => {
    services.close().then(
      () => process.exit(0),
      (err: unknown) => {
        console.error('[Server] shutdown failed:', err);
        process.exit(1);
      }
    );
  });
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
