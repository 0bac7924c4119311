/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import * as env from './lib/env.js';

//
// HTTP server
//

// HTTP server port
export const PORT = env.positiveIntOrDefault('PORT', 4000);

// Site every request is resolved against. When unset the request hostname is
// used, so one process can serve mappings for several domains.
export const SITE_DOMAIN = env.varOrUndefined('SITE_DOMAIN');

//
// Mapping store
//

export const MAPPINGS_DB_PATH = env.varOrDefault(
  'MAPPINGS_DB_PATH',
  'data/sqlite/mappings.db',
);

// Optional JSON file of content handlers and mappings loaded at startup
export const MAPPING_FIXTURES_PATH = env.varOrUndefined('MAPPING_FIXTURES_PATH');

//
// Mapping cache
//

export const MAPPING_CACHE_TYPE = env.varOrDefault('MAPPING_CACHE_TYPE', 'node');

export const REDIS_CACHE_URL = env.varOrDefault(
  'REDIS_CACHE_URL',
  'redis://localhost:6379',
);

export const MAPPING_CACHE_TTL_SECONDS = env.positiveIntOrDefault(
  'MAPPING_CACHE_TTL_SECONDS',
  60 * 60, // 1 hour
);

// Only applies to the in-process cache
export const MAPPING_CACHE_MAX_KEYS = env.positiveIntOrDefault(
  'MAPPING_CACHE_MAX_KEYS',
  10000,
);

export const CACHE_KEY_PREFIX = env.varOrDefault('CACHE_KEY_PREFIX', 'urlmap:');

export const REDIS_USE_TLS =
  env.varOrDefault('REDIS_USE_TLS', 'false') === 'true';
