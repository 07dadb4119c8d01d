import { createServer } from './createServer';
import { createMemoryStorage } from './storage/MemoryStorage';
import { getServerConfig } from './config';
import { devLog } from './utils/log';

const config = getServerConfig();
const app = createServer({ storage: createMemoryStorage(), staticDir: config.staticDir });

app.listen(config.port, config.host, () => {
  devLog(`[server] listening on http://${config.host}:${config.port} (static: ${config.staticDir})`);
});
