/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import path from 'node:path';

// Everything outside RFC 3986 unreserved and sub-delim characters (plus '/',
// ':' and '@') is dropped. Non-ASCII is dropped rather than transliterated.
const UNSAFE_CHARACTERS = /[^a-z0-9\-._~/!$&'()*+,;=:@]/g;

/**
 * Normalizes a request path into the form mappings are stored under:
 * lower-cased, unsafe characters removed, repeated separators collapsed,
 * dot-segments resolved and no trailing separator. The result is always
 * absolute, and `..` segments never climb above the root.
 *
 * @example
 * canonicalizePath('./../this/./is/./only/../a/./test.html')
 * // Returns: '/this/is/a/test.html'
 */
export function canonicalizePath(rawPath: string): string {
  // Lower-cased first, so letters such as KELVIN SIGN fold to ASCII and stay
  const safe = rawPath.toLowerCase().replace(UNSAFE_CHARACTERS, '');

  // Rooting first means leading '..' segments have nothing to pop
  const normalized = path.posix.normalize(`/${safe}`);

  return normalized.length > 1 && normalized.endsWith('/')
    ? normalized.slice(0, -1)
    : normalized;
}
