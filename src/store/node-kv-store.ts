/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import NodeCache from 'node-cache';
import winston from 'winston';

import * as metrics from '../metrics.js';
import type { KVBufferStore } from '../types.js';

// node-cache sets `name` to its error code
const isCacheFullError = (error: unknown): boolean =>
  error instanceof Error && error.name === 'ECACHEFULL';

/**
 * In-process KVBufferStore. Every key expires `ttlSeconds` after it was last
 * set. Once `maxKeys` is reached new keys are not stored, while keys already
 * present are still replaced so a write never leaves an old value behind.
 */
export class NodeKvStore implements KVBufferStore {
  private log: winston.Logger;
  private cache: NodeCache;

  constructor({
    log,
    ttlSeconds,
    maxKeys,
  }: {
    log: winston.Logger;
    ttlSeconds: number;
    maxKeys: number;
  }) {
    this.log = log.child({ class: this.constructor.name });
    this.cache = new NodeCache({
      stdTTL: ttlSeconds,
      maxKeys,
      deleteOnExpire: true,
      useClones: false,
      checkperiod: Math.min(60 * 5, ttlSeconds),
    });
  }

  async get(key: string): Promise<Buffer | undefined> {
    return this.cache.get<Buffer>(key);
  }

  async set(key: string, buffer: Buffer): Promise<void> {
    try {
      this.cache.set(key, buffer);
    } catch (error: unknown) {
      if (!isCacheFullError(error)) {
        throw error;
      }

      // node-cache refuses replacements too when full
      if (this.cache.has(key)) {
        this.cache.del(key);
        this.cache.set(key, buffer);
        return;
      }

      metrics.kvStoreFullCounter.inc();
      this.log.warn('Cache full, skipping write', {
        key,
        keys: this.cache.keys().length,
      });
    }
  }

  async del(key: string): Promise<void> {
    this.cache.del(key);
  }

  async has(key: string): Promise<boolean> {
    return this.cache.has(key);
  }

  async close(): Promise<void> {
    this.cache.close();
  }
}
