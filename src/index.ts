#!/usr/bin/env node

import { config } from 'dotenv';
import { loadConfig, validateConfig } from './config.js';
import { LokiMcpServer } from './server.js';

// Load environment variables
config();

const serverConfig = loadConfig();
const validation = validateConfig(serverConfig);

if (!validation.isValid) {
  console.error('Configuration validation failed:', validation.errors);
  process.exit(1);
}

const server = new LokiMcpServer(serverConfig);
server.run().catch(error => {
  console.error('loki-mcp failed to start:', error);
  process.exit(1);
});
