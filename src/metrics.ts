/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import * as promClient from 'prom-client';

export const registry = promClient.register;

//
// Global error metrics
//

export const errorsCounter = new promClient.Counter({
  name: 'errors_total',
  help: 'Total error count',
});

export const uncaughtExceptionCounter = new promClient.Counter({
  name: 'uncaught_exceptions_total',
  help: 'Count of uncaught exceptions',
});

//
// Cache metrics
//

export const redisErrorCounter = new promClient.Counter({
  name: 'redis_errors_total',
  help: 'Number of errors redis cache has received',
});

export const kvStoreFullCounter = new promClient.Counter({
  name: 'kv_store_full_total',
  help: 'Number of writes skipped because the in-process cache was full',
});

export const mappingCacheHitCounter = new promClient.Counter({
  name: 'mapping_cache_hit_total',
  help: 'Number of hits in the mapping cache',
});

export const mappingCacheMissCounter = new promClient.Counter({
  name: 'mapping_cache_miss_total',
  help: 'Number of misses in the mapping cache',
});

export const mappingCacheWriteCounter = new promClient.Counter({
  name: 'mapping_cache_write_total',
  help: 'Number of mappings written to the mapping cache',
});

//
// Routing metrics
//

export const routingDecisionsCounter = new promClient.Counter({
  name: 'routing_decisions_total',
  help: 'Count of routing decisions by outcome',
  labelNames: ['kind'] as const,
});

export const viewDispatchErrorsCounter = new promClient.Counter({
  name: 'view_dispatch_errors_total',
  help: 'Count of errors raised while dispatching to a view',
  labelNames: ['view'] as const,
});
