import 'dotenv/config';
import { buildApp } from './app.js';
import { loadConfig, startupWarnings } from './config.js';

const config = loadConfig();
const app = await buildApp({ config });

const warnings = startupWarnings(config);
if (warnings.length > 0) {
  app.log.warn({ warnings }, 'startup checks: incomplete configuration');
} else {
  app.log.info('startup checks: ready');
}

await app.listen({ port: config.port, host: config.host });
