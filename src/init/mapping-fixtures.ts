/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import fs from 'node:fs';
import type { Logger } from 'winston';

import { ValidationError } from '../lib/error.js';
import { isRedirectStatus, isViewOptions } from '../lib/mappings.js';
import type {
  ContentHandlerStore,
  MappingStore,
  ViewOptions,
} from '../types.js';

export interface MappingFixture {
  site: string;
  path: string;
  statusCode?: number;
  forceSecure?: boolean;
  // path of the target on the same site
  redirectTo?: string;
  contentHandler?: { view: string; options?: ViewOptions };
}

type UnknownObject = { [key: string]: unknown };

const isObject = (value: unknown): value is UnknownObject =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const optional = <T>(
  value: unknown,
  guard: (value: unknown) => value is T,
): value is T | undefined => value === undefined || guard(value);

const isString = (value: unknown): value is string => typeof value === 'string';
const isBoolean = (value: unknown): value is boolean =>
  typeof value === 'boolean';
const isInteger = (value: unknown): value is number =>
  typeof value === 'number' && Number.isInteger(value);

function parseFixture(value: unknown, index: number): MappingFixture {
  if (
    !isObject(value) ||
    !isString(value.site) ||
    !isString(value.path) ||
    !optional(value.statusCode, isInteger) ||
    !optional(value.forceSecure, isBoolean) ||
    !optional(value.redirectTo, isString)
  ) {
    throw new ValidationError(`Invalid mapping fixture at index ${index}`);
  }

  let contentHandler: MappingFixture['contentHandler'];
  if (value.contentHandler !== undefined) {
    const handler = value.contentHandler;
    if (
      !isObject(handler) ||
      !isString(handler.view) ||
      !optional(handler.options, isViewOptions)
    ) {
      throw new ValidationError(
        `Invalid content handler in mapping fixture at index ${index}`,
      );
    }
    contentHandler = { view: handler.view, options: handler.options };
  }

  return {
    site: value.site,
    path: value.path,
    statusCode: value.statusCode,
    forceSecure: value.forceSecure,
    redirectTo: value.redirectTo,
    contentHandler,
  };
}

export function parseMappingFixtures(json: unknown): MappingFixture[] {
  if (!isObject(json) || !Array.isArray(json.mappings)) {
    throw new ValidationError('Mapping fixtures must have a mappings array');
  }
  return json.mappings.map((value: unknown, index) =>
    parseFixture(value, index),
  );
}

export function readMappingFixtures(path: string): MappingFixture[] {
  const json: unknown = JSON.parse(fs.readFileSync(path, 'utf8'));
  return parseMappingFixtures(json);
}

/**
 * Writes fixtures through the given stores. Existing mappings are updated in
 * place (their content handler included) so loading the same file again is a
 * no-op. Redirects are written last so their targets exist.
 */
export async function applyMappingFixtures({
  log,
  mappings,
  contentHandlers,
  fixtures,
}: {
  log: Logger;
  mappings: MappingStore;
  contentHandlers: ContentHandlerStore;
  fixtures: MappingFixture[];
}): Promise<number> {
  const ordered = [
    ...fixtures.filter((f) => !isRedirectStatus(f.statusCode ?? 200)),
    ...fixtures.filter((f) => isRedirectStatus(f.statusCode ?? 200)),
  ];

  for (const fixture of ordered) {
    const existing = await mappings.findByKey(fixture.site, fixture.path);

    let contentHandlerId: number | undefined;
    if (fixture.contentHandler !== undefined) {
      const handler = await contentHandlers.saveContentHandler({
        id: existing?.contentHandler?.id,
        ...fixture.contentHandler,
      });
      contentHandlerId = handler.id;
    }

    let redirectTargetId: number | undefined;
    if (fixture.redirectTo !== undefined) {
      const target = await mappings.findByKey(fixture.site, fixture.redirectTo);
      if (target === undefined) {
        throw new ValidationError(
          `Redirect target ${fixture.site}${fixture.redirectTo} not found`,
          { site: fixture.site, path: fixture.path },
        );
      }
      redirectTargetId = target.id;
    }

    await mappings.save({
      id: existing?.id,
      site: fixture.site,
      path: fixture.path,
      statusCode: fixture.statusCode,
      forceSecure: fixture.forceSecure,
      redirectTargetId,
      contentHandlerId,
    });
  }

  log.info('Applied mapping fixtures', { count: ordered.length });
  return ordered.length;
}
