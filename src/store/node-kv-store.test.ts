/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { strict as assert } from 'node:assert';
import { afterEach, beforeEach, describe, it, mock } from 'node:test';

import { createTestLogger } from '../../test/test-logger.js';
import * as metrics from '../metrics.js';
import { NodeKvStore } from './node-kv-store.js';

const log = createTestLogger({ suite: 'NodeKvStore' });

describe('NodeKvStore', () => {
  let kvStore: NodeKvStore;

  beforeEach(() => {
    kvStore = new NodeKvStore({ log, ttlSeconds: 60, maxKeys: 2 });
  });

  afterEach(async () => {
    mock.restoreAll();
    await kvStore.close();
  });

  it('should store and return buffers', async () => {
    await kvStore.set('key', Buffer.from('value'));

    assert.equal(await kvStore.has('key'), true);
    assert.deepEqual(await kvStore.get('key'), Buffer.from('value'));
  });

  it('should return undefined for missing keys', async () => {
    assert.equal(await kvStore.get('missing'), undefined);
    assert.equal(await kvStore.has('missing'), false);
  });

  it('should delete keys', async () => {
    await kvStore.set('key', Buffer.from('value'));
    await kvStore.del('key');

    assert.equal(await kvStore.has('key'), false);
  });

  it('should skip new keys once full', async () => {
    const full = mock.method(metrics.kvStoreFullCounter, 'inc');
    await kvStore.set('a', Buffer.from('1'));
    await kvStore.set('b', Buffer.from('2'));

    await kvStore.set('c', Buffer.from('3'));

    assert.equal(await kvStore.has('c'), false);
    assert.deepEqual(await kvStore.get('a'), Buffer.from('1'));
    assert.equal(full.mock.callCount(), 1);
  });

  it('should replace existing keys once full', async () => {
    await kvStore.set('a', Buffer.from('1'));
    await kvStore.set('b', Buffer.from('2'));

    await kvStore.set('a', Buffer.from('updated'));

    assert.deepEqual(await kvStore.get('a'), Buffer.from('updated'));
    assert.deepEqual(await kvStore.get('b'), Buffer.from('2'));
  });
});
