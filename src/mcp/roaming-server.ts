#!/usr/bin/env node

/**
 * Roaming tool server
 *
 * Serves the roaming tools over stdio. Launched by the agent CLI as
 * `roaming-agent dist/mcp/roaming-server.js`.
 */

import 'dotenv/config';
import { getConfig } from '../config/index.js';
import { makeLogger } from '../logging/logger.js';
import { RoamingApiClient } from '../roaming/roaming-api.js';
import { roamingTools } from '../roaming/roaming-tools.js';
import { ToolRegistry } from './tool-registry.js';
import { ToolServer } from './tool-server.js';

const config = getConfig();
const logger = makeLogger({ component: 'roaming-server' }, config.logLevel);

const registry = new ToolRegistry();
registry.registerAll(roamingTools(), {
  api: new RoamingApiClient(config.roamingApiBaseUrl),
  logger,
});

const server = new ToolServer(registry, { name: 'roaming', version: '0.1.0' }, logger);

logger.info({ tools: registry.getDefinitions().map((t) => t.name) }, 'Roaming tool server started');

server
  .serve(process.stdin, process.stdout)
  .then(() => {
    logger.info('Input closed, shutting down');
  })
  .catch((error: unknown) => {
    logger.error({ err: error }, 'Tool server failed');
    process.exit(1);
  });
