import { buildApp } from './app.js';
import { createRemoteClient } from './clientFactory.js';
import { resolveConfig } from './config.js';
import { registerEncodingProviders } from './encodings.js';
import { getLogger } from './logger.js';
import { RemoteFileService } from './remoteFileService.js';

const config = resolveConfig();
const logger = getLogger(config.logLevel);

const encodings = registerEncodingProviders();
logger.debug({ encodings }, 'Registered text encodings');

const service = new RemoteFileService(createRemoteClient(config), config, logger);
const app = buildApp({ service, protocol: config.protocol, logger });

app.listen({ port: config.listenPort, host: config.listenHost }).catch((err: unknown) => {
  app.log.error(err, 'Failed to start FTP MCP bridge');
  process.exit(1);
});
