/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { createHash } from 'node:crypto';

import { fromMsgpack, toMsgpack } from './encoding.js';
import type {
  ContentHandler,
  MappingRecord,
  RedirectTarget,
  ViewOptionValue,
  ViewOptions,
} from '../types.js';

export const DEFAULT_STATUS_CODE = 200;
export const GONE_STATUS_CODE = 410;
export const PERMANENT_REDIRECT_STATUS_CODE = 301;
export const TEMPORARY_REDIRECT_STATUS_CODE = 302;

export function isRedirectStatus(statusCode: number): boolean {
  return (
    statusCode === PERMANENT_REDIRECT_STATUS_CODE ||
    statusCode === TEMPORARY_REDIRECT_STATUS_CODE
  );
}

/**
 * Hex MD5 of the site followed by the canonical path. Used as the cache key
 * for a mapping, so it must be recomputed whenever either part changes.
 */
export function mappingDigest(site: string, path: string): string {
  return createHash('md5').update(`${site}${path}`, 'utf8').digest('hex');
}

export function mappingProtocol({
  forceSecure,
}: {
  forceSecure: boolean;
}): 'http' | 'https' {
  return forceSecure ? 'https' : 'http';
}

// Absolute URL of a mapping, e.g. 'https://example.com/about'
export function mappingUrl(
  mapping: Pick<MappingRecord | RedirectTarget, 'site' | 'path' | 'forceSecure'>,
): string {
  return `${mappingProtocol(mapping)}://${mapping.site}${mapping.path}`;
}

//
// Cache encoding
//

type UnknownObject = { [key: string]: unknown };

const isObject = (value: unknown): value is UnknownObject =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const isInteger = (value: unknown): value is number =>
  typeof value === 'number' && Number.isInteger(value);

const isViewOptionValue = (value: unknown): value is ViewOptionValue => {
  if (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean'
  ) {
    return true;
  }
  if (Array.isArray(value)) {
    return value.every(isViewOptionValue);
  }
  return isObject(value) && Object.values(value).every(isViewOptionValue);
};

export const isViewOptions = (value: unknown): value is ViewOptions =>
  isObject(value) && Object.values(value).every(isViewOptionValue);

function decodeRedirectTarget(value: unknown): RedirectTarget | undefined {
  if (
    isObject(value) &&
    isInteger(value.id) &&
    typeof value.site === 'string' &&
    typeof value.path === 'string' &&
    isInteger(value.statusCode) &&
    typeof value.forceSecure === 'boolean'
  ) {
    return {
      id: value.id,
      site: value.site,
      path: value.path,
      statusCode: value.statusCode,
      forceSecure: value.forceSecure,
    };
  }
  return undefined;
}

function decodeContentHandler(value: unknown): ContentHandler | undefined {
  if (
    isObject(value) &&
    isInteger(value.id) &&
    typeof value.view === 'string' &&
    isViewOptions(value.options)
  ) {
    return { id: value.id, view: value.view, options: value.options };
  }
  return undefined;
}

export function encodeMappingRecord(record: MappingRecord): Buffer {
  return toMsgpack(record);
}

/**
 * Decodes a cached mapping. Returns undefined for anything that does not have
 * the shape of a mapping so callers can fall back to the store.
 */
export function decodeMappingRecord(buffer: Buffer): MappingRecord | undefined {
  const value = fromMsgpack(buffer);
  if (
    !isObject(value) ||
    !isInteger(value.id) ||
    typeof value.site !== 'string' ||
    typeof value.path !== 'string' ||
    typeof value.digest !== 'string' ||
    !isInteger(value.statusCode) ||
    typeof value.forceSecure !== 'boolean'
  ) {
    return undefined;
  }

  const redirectTarget = decodeRedirectTarget(value.redirectTarget);
  const contentHandler = decodeContentHandler(value.contentHandler);
  if (
    (value.redirectTarget != null && redirectTarget === undefined) ||
    (value.contentHandler != null && contentHandler === undefined)
  ) {
    return undefined;
  }

  return {
    id: value.id,
    site: value.site,
    path: value.path,
    digest: value.digest,
    statusCode: value.statusCode,
    forceSecure: value.forceSecure,
    ...(redirectTarget !== undefined && { redirectTarget }),
    ...(contentHandler !== undefined && { contentHandler }),
  };
}
