import 'dotenv/config';
import { createServer } from 'http';
import { createApp } from './app.js';
import { ConfigManager } from './configManager.js';
import { createLogger, enableNamespaces, NAMESPACES } from './logging.js';

const configManager = new ConfigManager();
enableNamespaces(configManager.getConfig().debug?.enabledNamespaces);

const serverLog = createLogger(NAMESPACES.server.main);

const app = createApp(configManager);
const server = createServer(app);

const PORT = Number(process.env.PORT || 3001);
server.listen(PORT, () => {
  serverLog('Parley negotiation API listening on port %d', PORT);
  console.log(`Parley negotiation API listening on http://localhost:${PORT}`);
});

export { app, server };
