/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { Redis } from 'ioredis';
import winston from 'winston';

import * as metrics from '../metrics.js';
import type { KVBufferStore } from '../types.js';

// Shared KVBufferStore for several gateway processes; every set carries the TTL
export class RedisKvStore implements KVBufferStore {
  private client: Redis;
  private log: winston.Logger;
  private ttlSeconds: number;

  constructor({
    log,
    redisUrl,
    ttlSeconds,
    useTls = false,
  }: {
    log: winston.Logger;
    redisUrl: string;
    ttlSeconds: number;
    useTls?: boolean;
  }) {
    this.log = log.child({ class: this.constructor.name });
    this.ttlSeconds = ttlSeconds;
    this.client = new Redis(redisUrl, useTls ? { tls: {} } : {});
    this.client.on('error', (error: Error) => {
      this.log.error('Redis error', {
        message: error.message,
        stack: error.stack,
        url: redisUrl,
      });
      metrics.redisErrorCounter.inc();
    });
  }

  async get(key: string): Promise<Buffer | undefined> {
    const value = await this.client.getBuffer(key);
    return value ?? undefined;
  }

  async has(key: string): Promise<boolean> {
    return (await this.client.exists(key)) === 1;
  }

  async del(key: string): Promise<void> {
    await this.client.del(key);
  }

  async set(key: string, buffer: Buffer): Promise<void> {
    await this.client.set(key, buffer, 'EX', this.ttlSeconds);
  }

  async close(): Promise<void> {
    await this.client.quit();
  }
}
