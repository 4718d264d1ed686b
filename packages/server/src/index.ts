export { createServerApp } from './app.js';
export {
  loadServerConfig,
  ServerEnvSchema,
  type ServerConfig,
  type ServerEnv,
} from './config.js';
export { FileCaseRecords } from './fileCaseRecords.js';
export { createLogger, startServer } from './server.js';
