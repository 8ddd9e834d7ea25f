// apps/server/src/index.ts
import 'dotenv/config';
import { componentLogger, loadConfig } from '@ghl-oauth/token-manager';
import { createApp } from './app.js';
import { createStore } from './db.js';
import { createServices } from './services.js';

const log = componentLogger('http');

const config = loadConfig();
const app = createApp(createServices(config, createStore(config)));
const port = Number(process.env.PORT || 3000);

// Only auto-start when not running tests
if (process.env.NODE_ENV !== 'test') {
  app.listen(port, () => log.info({ port }, 'server listening'));
}

export default app;
