import { env } from './config/env.js';
import { buildApp } from './app.js';

const app = buildApp();

// Start server
const start = async () => {
  try {
    await app.listen({ port: env.port, host: env.host });
    app.log.info(`Catalog API running at http://localhost:${env.port}`);
  } catch (err) {
    app.log.error(err);
    process.exit(1);
  }
};

void start();
