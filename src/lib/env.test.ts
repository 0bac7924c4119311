/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { strict as assert } from 'node:assert';
import { afterEach, describe, it } from 'node:test';

import { positiveIntOrDefault, varOrDefault, varOrUndefined } from './env.js';

const VAR = 'URLMAP_ENV_TEST_VALUE';

describe('env', () => {
  afterEach(() => {
    delete process.env[VAR];
  });

  it('should fall back to the default for unset or blank variables', () => {
    assert.equal(varOrDefault(VAR, 'fallback'), 'fallback');
    process.env[VAR] = '  ';
    assert.equal(varOrDefault(VAR, 'fallback'), 'fallback');
    assert.equal(varOrUndefined(VAR), undefined);
  });

  it('should return set variables unchanged', () => {
    process.env[VAR] = 'value';
    assert.equal(varOrDefault(VAR, 'fallback'), 'value');
    assert.equal(varOrUndefined(VAR), 'value');
  });

  describe('positiveIntOrDefault', () => {
    it('should parse positive integers', () => {
      process.env[VAR] = '8080';
      assert.equal(positiveIntOrDefault(VAR, 4000), 8080);
    });

    it('should use the default when unset', () => {
      assert.equal(positiveIntOrDefault(VAR, 4000), 4000);
    });

    it('should reject values that are not positive integers', () => {
      for (const value of ['abc', '0', '-1', '1.5']) {
        process.env[VAR] = value;
        assert.throws(() => positiveIntOrDefault(VAR, 4000), {
          message: `${VAR} must be a positive integer, got: ${value}`,
        });
      }
    });
  });
});
