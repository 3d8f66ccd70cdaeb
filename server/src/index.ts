import dotenv from 'dotenv';
import { loadConfig } from './config.js';
import { createApp } from './app.js';
import { createAssistant } from './services/assistant.js';
import { getDefaultSources } from './services/providers.js';

dotenv.config();

const config = loadConfig();
const assistant = createAssistant(config, { sources: getDefaultSources(config) });
const app = createApp(assistant);

app.listen(config.port, () => {
  console.log(`otter-answers listening on http://localhost:${config.port} (race deadline ${config.raceDeadlineMs}ms)`);
});
