/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { strict as assert } from 'node:assert';
import { describe, it } from 'node:test';

import { toMsgpack } from './encoding.js';
import {
  decodeMappingRecord,
  encodeMappingRecord,
  isRedirectStatus,
  isViewOptions,
  mappingDigest,
  mappingProtocol,
  mappingUrl,
} from './mappings.js';
import type { MappingRecord } from '../types.js';

describe('mappingDigest', () => {
  it('should hash the site followed by the path', () => {
    assert.equal(
      mappingDigest('example.com', '/test_path'),
      '389661d2e64f9d426ad306abe6e8f957',
    );
  });

  it('should change when the path changes', () => {
    assert.notEqual(
      mappingDigest('example.com', '/test_path'),
      mappingDigest('example.com', '/other_path'),
    );
  });
});

describe('mappingProtocol', () => {
  it('should use http by default', () => {
    assert.equal(mappingProtocol({ forceSecure: false }), 'http');
  });

  it('should use https when the mapping forces it', () => {
    assert.equal(mappingProtocol({ forceSecure: true }), 'https');
  });
});

describe('mappingUrl', () => {
  it('should build an absolute URL from the site and path', () => {
    assert.equal(
      mappingUrl({ site: 'example.com', path: '/test_path', forceSecure: false }),
      'http://example.com/test_path',
    );
    assert.equal(
      mappingUrl({ site: 'example.com', path: '/test_path', forceSecure: true }),
      'https://example.com/test_path',
    );
  });
});

describe('isRedirectStatus', () => {
  it('should only accept 301 and 302', () => {
    assert.equal(isRedirectStatus(301), true);
    assert.equal(isRedirectStatus(302), true);
    assert.equal(isRedirectStatus(200), false);
    assert.equal(isRedirectStatus(307), false);
    assert.equal(isRedirectStatus(410), false);
  });
});

describe('isViewOptions', () => {
  it('should accept nested primitive values', () => {
    assert.equal(
      isViewOptions({ initkwargs: { body: 'hi', tags: ['a', 1, null] } }),
      true,
    );
  });

  it('should reject arrays and non-serializable values', () => {
    assert.equal(isViewOptions(['a']), false);
    assert.equal(isViewOptions({ fn: () => undefined }), false);
    assert.equal(isViewOptions(null), false);
  });
});

describe('decodeMappingRecord', () => {
  const record: MappingRecord = {
    id: 2,
    site: 'example.com',
    path: '/source',
    digest: mappingDigest('example.com', '/source'),
    statusCode: 301,
    forceSecure: false,
    redirectTarget: {
      id: 1,
      site: 'example.com',
      path: '/target',
      statusCode: 204,
      forceSecure: true,
    },
  };

  it('should decode an encoded mapping', () => {
    assert.deepEqual(decodeMappingRecord(encodeMappingRecord(record)), record);
  });

  it('should decode a mapping with a content handler', () => {
    const withHandler: MappingRecord = {
      id: 3,
      site: 'example.com',
      path: '/test',
      digest: mappingDigest('example.com', '/test'),
      statusCode: 200,
      forceSecure: false,
      contentHandler: {
        id: 7,
        view: 'text',
        options: { initkwargs: { body: 'hello' } },
      },
    };
    assert.deepEqual(
      decodeMappingRecord(encodeMappingRecord(withHandler)),
      withHandler,
    );
  });

  it('should return undefined for values that are not mappings', () => {
    assert.equal(decodeMappingRecord(toMsgpack({ unexpected: true })), undefined);
    assert.equal(decodeMappingRecord(toMsgpack('text')), undefined);
  });

  it('should return undefined when the redirect target is malformed', () => {
    assert.equal(
      decodeMappingRecord(
        toMsgpack({ ...record, redirectTarget: { id: 'one' } }),
      ),
      undefined,
    );
  });
});
