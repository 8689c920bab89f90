export { ApiServer, DEFAULT_SERVER_CONFIG, RESOURCE_PATH, type ServerConfig } from './express.js';
