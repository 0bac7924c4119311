/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import winston from 'winston';

import { canonicalizePath } from '../lib/canonical-path.js';
import {
  decodeMappingRecord,
  encodeMappingRecord,
  mappingDigest,
} from '../lib/mappings.js';
import * as metrics from '../metrics.js';
import type {
  KVBufferStore,
  MappingInput,
  MappingRecord,
  MappingStore,
} from '../types.js';

/**
 * Caches mappings by digest in front of the authoritative store. Lookups read
 * through (at most one store read per miss, absence is never cached) and
 * writes go through (the saved record replaces the cached one). When a save
 * moves a mapping to a new site or path the entry under the old digest is
 * left to expire with the cache TTL.
 */
export class ReadThroughMappingCache implements MappingStore {
  private log: winston.Logger;
  private store: MappingStore;
  private kvStore: KVBufferStore;
  private keyPrefix: string;

  constructor({
    log,
    store,
    kvStore,
    keyPrefix = '',
  }: {
    log: winston.Logger;
    store: MappingStore;
    kvStore: KVBufferStore;
    keyPrefix?: string;
  }) {
    this.log = log.child({ class: this.constructor.name });
    this.store = store;
    this.kvStore = kvStore;
    this.keyPrefix = keyPrefix;
  }

  cacheKey(site: string, canonicalPath: string): string {
    return `${this.keyPrefix}${mappingDigest(site, canonicalPath)}`;
  }

  private async put(record: MappingRecord): Promise<void> {
    await this.kvStore.set(
      `${this.keyPrefix}${record.digest}`,
      encodeMappingRecord(record),
    );
    metrics.mappingCacheWriteCounter.inc();
  }

  async findByKey(
    site: string,
    path: string,
  ): Promise<MappingRecord | undefined> {
    const canonicalPath = canonicalizePath(path);
    const key = this.cacheKey(site, canonicalPath);

    const cached = await this.kvStore.get(key);
    if (cached !== undefined) {
      try {
        const record = decodeMappingRecord(cached);
        if (record !== undefined) {
          metrics.mappingCacheHitCounter.inc();
          this.log.debug('Mapping cache hit', { site, path: canonicalPath });
          return record;
        }
        this.log.warn('Ignoring malformed mapping cache entry', {
          site,
          path: canonicalPath,
          key,
        });
      } catch (error: unknown) {
        this.log.warn('Unable to decode mapping cache entry', {
          site,
          path: canonicalPath,
          key,
          message: error instanceof Error ? error.message : String(error),
        });
      }
    }

    metrics.mappingCacheMissCounter.inc();
    this.log.debug('Mapping cache miss', { site, path: canonicalPath });

    const record = await this.store.findByKey(site, canonicalPath);
    if (record !== undefined) {
      await this.put(record);
    }
    return record;
  }

  async findById(id: number): Promise<MappingRecord | undefined> {
    return this.store.findById(id);
  }

  async save(input: MappingInput): Promise<MappingRecord> {
    const record = await this.store.save(input);
    await this.put(record);
    return record;
  }

  async create(input: Omit<MappingInput, 'id'>): Promise<MappingRecord> {
    const record = await this.store.create(input);
    await this.put(record);
    return record;
  }
}
