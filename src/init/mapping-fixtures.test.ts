/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { strict as assert } from 'node:assert';
import { afterEach, beforeEach, describe, it } from 'node:test';

import { createTestLogger } from '../../test/test-logger.js';
import {
  SITE,
  createMappingStack,
  type MappingStack,
} from '../../test/mapping-stack.js';
import {
  applyMappingFixtures,
  parseMappingFixtures,
  type MappingFixture,
} from './mapping-fixtures.js';

const log = createTestLogger({ suite: 'mapping-fixtures' });

describe('parseMappingFixtures', () => {
  it('should parse mappings with optional fields', () => {
    assert.deepEqual(
      parseMappingFixtures({
        mappings: [
          { site: SITE, path: '/new' },
          {
            site: SITE,
            path: '/old',
            statusCode: 301,
            redirectTo: '/new',
          },
          {
            site: SITE,
            path: '/hello',
            contentHandler: { view: 'text', options: { initkwargs: { body: 'hi' } } },
          },
        ],
      }),
      [
        {
          site: SITE,
          path: '/new',
          statusCode: undefined,
          forceSecure: undefined,
          redirectTo: undefined,
          contentHandler: undefined,
        },
        {
          site: SITE,
          path: '/old',
          statusCode: 301,
          forceSecure: undefined,
          redirectTo: '/new',
          contentHandler: undefined,
        },
        {
          site: SITE,
          path: '/hello',
          statusCode: undefined,
          forceSecure: undefined,
          redirectTo: undefined,
          contentHandler: {
            view: 'text',
            options: { initkwargs: { body: 'hi' } },
          },
        },
      ],
    );
  });

  it('should require a mappings array', () => {
    assert.throws(() => parseMappingFixtures({ mapping: [] }), {
      name: 'ValidationError',
      message: 'Mapping fixtures must have a mappings array',
    });
  });

  it('should name the invalid fixture', () => {
    assert.throws(
      () =>
        parseMappingFixtures({
          mappings: [{ site: SITE, path: '/ok' }, { site: SITE, path: 7 }],
        }),
      { message: 'Invalid mapping fixture at index 1' },
    );
    assert.throws(
      () =>
        parseMappingFixtures({
          mappings: [{ site: SITE, path: '/ok', contentHandler: { view: 1 } }],
        }),
      { message: 'Invalid content handler in mapping fixture at index 0' },
    );
  });
});

describe('applyMappingFixtures', () => {
  let stack: MappingStack;

  const fixtures: MappingFixture[] = [
    // listed before its target on purpose
    { site: SITE, path: '/old', statusCode: 301, redirectTo: '/new' },
    {
      site: SITE,
      path: '/new',
      contentHandler: { view: 'text', options: { initkwargs: { body: 'hi' } } },
    },
    { site: SITE, path: '/gone', statusCode: 410 },
  ];

  beforeEach(() => {
    stack = createMappingStack(log);
  });

  afterEach(async () => {
    await stack.close();
  });

  it('should write targets before redirects', async () => {
    const count = await applyMappingFixtures({
      log,
      mappings: stack.cache,
      contentHandlers: stack.db,
      fixtures,
    });

    assert.equal(count, 3);
    const old = await stack.db.findByKey(SITE, '/old');
    assert.equal(old?.redirectTarget?.id, 1);
    assert.equal(old?.redirectTarget?.path, '/new');
    assert.deepEqual(await stack.resolver.resolve(SITE, '/gone'), {
      kind: 'gone',
      record: await stack.db.findByKey(SITE, '/gone'),
    });
  });

  it('should update existing mappings when applied again', async () => {
    await applyMappingFixtures({
      log,
      mappings: stack.cache,
      contentHandlers: stack.db,
      fixtures,
    });
    await applyMappingFixtures({
      log,
      mappings: stack.cache,
      contentHandlers: stack.db,
      fixtures: fixtures.map((fixture) =>
        fixture.path === '/new'
          ? {
              ...fixture,
              contentHandler: {
                view: 'text',
                options: { initkwargs: { body: 'updated' } },
              },
            }
          : fixture,
      ),
    });

    assert.equal(await stack.db.findById(4), undefined);
    assert.equal(await stack.db.findContentHandlerById(2), undefined);
    assert.deepEqual((await stack.db.findByKey(SITE, '/new'))?.contentHandler, {
      id: 1,
      view: 'text',
      options: { initkwargs: { body: 'updated' } },
    });
    assert.equal((await stack.db.findByKey(SITE, '/old'))?.redirectTarget?.id, 1);
  });

  it('should reject redirects to missing paths', async () => {
    await assert.rejects(
      applyMappingFixtures({
        log,
        mappings: stack.cache,
        contentHandlers: stack.db,
        fixtures: [
          { site: SITE, path: '/old', statusCode: 302, redirectTo: '/missing' },
        ],
      }),
      {
        name: 'ValidationError',
        message: `Redirect target ${SITE}/missing not found`,
      },
    );
  });
});
