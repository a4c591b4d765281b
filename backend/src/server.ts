import 'dotenv/config';
import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { createDatabase } from './db.js';
import { ensureSchema } from './schema.js';

const config = loadConfig();
const db = createDatabase(config.database);
await ensureSchema(db);

const app = createApp({ db, limits: config.limits });
app.listen(config.apiPort, () => {
  console.log(`[api] up on :${config.apiPort}`);
});
