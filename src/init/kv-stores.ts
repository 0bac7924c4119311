/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import type { Logger } from 'winston';

import { NodeKvStore } from '../store/node-kv-store.js';
import { RedisKvStore } from '../store/redis-kv-store.js';
import type { KVBufferStore } from '../types.js';

const supportedKvStores = ['node', 'redis'] as const;
export type KvStoreType = (typeof supportedKvStores)[number];

export const isKvStoreType = (type: string): type is KvStoreType =>
  supportedKvStores.some((supported) => supported === type);

export const createMappingKvStore = ({
  log,
  type,
  redisUrl,
  redisUseTls,
  ttlSeconds,
  maxKeys,
}: {
  log: Logger;
  type: string;
  redisUrl: string;
  redisUseTls: boolean;
  ttlSeconds: number;
  maxKeys: number;
}): KVBufferStore => {
  if (!isKvStoreType(type)) {
    throw new Error(
      `Unsupported mapping cache type: ${type} (expected ${supportedKvStores.join(' or ')})`,
    );
  }

  log.info(`Using ${type} as KVBufferStore for mappings`, {
    type,
    ttlSeconds,
    ...(type === 'redis' ? { redisUrl } : { maxKeys }),
  });

  if (type === 'redis') {
    return new RedisKvStore({
      log,
      redisUrl,
      useTls: redisUseTls,
      ttlSeconds,
    });
  }
  return new NodeKvStore({ log, ttlSeconds, maxKeys });
};
