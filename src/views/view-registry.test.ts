/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { strict as assert } from 'node:assert';
import { describe, it } from 'node:test';

import { HandlerReferenceError } from '../lib/error.js';
import { TextView, jsonView, registerBuiltinViews } from './builtin-views.js';
import { ViewRegistry } from './view-registry.js';

describe('ViewRegistry', () => {
  it('should resolve registered views by name', () => {
    const registry = registerBuiltinViews(new ViewRegistry());

    assert.deepEqual(registry.resolve('text'), { kind: 'class', cls: TextView });
    assert.deepEqual(registry.resolve('json'), {
      kind: 'function',
      fn: jsonView,
    });
    assert.deepEqual(registry.names(), ['json', 'text']);
  });

  it('should report whether a view is registered', () => {
    const registry = new ViewRegistry().registerFunction('json', jsonView);

    assert.equal(registry.has('json'), true);
    assert.equal(registry.has('text'), false);
  });

  it('should throw HandlerReferenceError for unknown views', () => {
    const registry = new ViewRegistry();

    assert.throws(
      () => registry.resolve('nonexistent'),
      (error: unknown) =>
        error instanceof HandlerReferenceError &&
        error.message === 'Unknown view: nonexistent',
    );
  });

  it('should refuse to register a name twice', () => {
    const registry = new ViewRegistry().registerFunction('json', jsonView);

    assert.throws(() => registry.registerClass('json', TextView), {
      message: 'View already registered: json',
    });
  });
});
