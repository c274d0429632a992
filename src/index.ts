import 'dotenv/config';
import { buildApp } from './app.js';
import { loadConfig } from './lib/config.js';

const config = loadConfig();
const app = buildApp(config);

app.listen({ port: config.port, host: '0.0.0.0' }).then(() => {
  app.log.info(`testcase-renamer listening on :${config.port} [source=${config.sourceRoot}]`);
}).catch((err) => {
  app.log.error(err);
  process.exit(1);
});
