/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import fs from 'node:fs';
import path from 'node:path';

import { ReadThroughMappingCache } from './cache/read-through-mapping-cache.js';
import * as config from './config.js';
import { SqliteMappingStore } from './database/sqlite-mapping-store.js';
import { createMappingKvStore } from './init/kv-stores.js';
import {
  applyMappingFixtures,
  readMappingFixtures,
} from './init/mapping-fixtures.js';
import log from './log.js';
import * as metrics from './metrics.js';
import { MappingResolver } from './resolution/mapping-resolver.js';
import { registerBuiltinViews } from './views/builtin-views.js';
import { ContentDispatcher } from './views/content-dispatcher.js';
import { ViewRegistry } from './views/view-registry.js';

type CleanupHandler = {
  name: string;
  handler: () => Promise<void>;
};

const cleanupHandlers: CleanupHandler[] = [];

/**
 * Register a cleanup handler to be called during shutdown, in registration
 * order and before the stores are closed.
 */
export function registerCleanupHandler(
  name: string,
  handler: () => Promise<void>,
): void {
  cleanupHandlers.push({ name, handler });
  log.debug(`Registered cleanup handler: ${name}`);
}

process.on('uncaughtException', (error) => {
  metrics.uncaughtExceptionCounter.inc();
  log.error('Uncaught exception:', error);
});

//
// Views
//

export const viewRegistry = registerBuiltinViews(new ViewRegistry());

export const contentDispatcher = new ContentDispatcher({
  log,
  views: viewRegistry,
});

//
// Mappings
//

if (config.MAPPINGS_DB_PATH !== ':memory:') {
  fs.mkdirSync(path.dirname(config.MAPPINGS_DB_PATH), { recursive: true });
}

export const mappingDb = new SqliteMappingStore({
  log,
  dbPath: config.MAPPINGS_DB_PATH,
  viewResolver: viewRegistry,
});

export const mappingKvStore = createMappingKvStore({
  log,
  type: config.MAPPING_CACHE_TYPE,
  redisUrl: config.REDIS_CACHE_URL,
  redisUseTls: config.REDIS_USE_TLS,
  ttlSeconds: config.MAPPING_CACHE_TTL_SECONDS,
  maxKeys: config.MAPPING_CACHE_MAX_KEYS,
});

// Every mapping write in the process goes through this cache
export const mappingStore = new ReadThroughMappingCache({
  log,
  store: mappingDb,
  kvStore: mappingKvStore,
  keyPrefix: config.CACHE_KEY_PREFIX,
});

export const resolver = new MappingResolver({
  log,
  mappings: mappingStore,
});

if (config.MAPPING_FIXTURES_PATH !== undefined) {
  await applyMappingFixtures({
    log,
    mappings: mappingStore,
    contentHandlers: mappingDb,
    fixtures: readMappingFixtures(config.MAPPING_FIXTURES_PATH),
  });
}

let isShuttingDown = false;

export const shutdown = async (exitCode = 0) => {
  if (isShuttingDown) {
    log.info('Shutdown already in progress');
    return;
  }
  isShuttingDown = true;
  log.info('Shutting down...');

  for (const { name, handler } of cleanupHandlers) {
    try {
      log.debug(`Running cleanup handler: ${name}`);
      await handler();
    } catch (error: unknown) {
      log.error(`Error in cleanup handler: ${name}`, {
        error: error instanceof Error ? error.message : String(error),
        stack: error instanceof Error ? error.stack : undefined,
      });
    }
  }

  await mappingKvStore.close();
  mappingDb.close();

  log.info('Shutdown complete');
  process.exit(exitCode);
};

// Handle shutdown signals
process.on('SIGINT', async () => {
  await shutdown();
});

process.on('SIGTERM', async () => {
  await shutdown();
});
