import dotenv from 'dotenv';
import { createApp } from './app.js';
import { loadServerConfig } from './config.js';

dotenv.config();

const config = loadServerConfig();
const app = createApp(config);

app.listen(config.port, () => {
  console.log(`Server listening on http://localhost:${config.port}`);
});
