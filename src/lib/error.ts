/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */

interface DetailedErrorOptions {
  stack?: string;
  [key: string]: unknown;
}

export class DetailedError extends Error {
  constructor(message: string, options?: DetailedErrorOptions) {
    super(message);
    this.name = this.constructor.name;
    Object.assign(this, options);
    this.stack = options?.stack ?? new Error().stack;
  }

  toJSON() {
    const { name, message, ...rest } = this;
    return {
      name,
      message,
      stack: this.stack,
      ...rest,
    };
  }
}

/**
 * No mapping exists for a site and canonical path. Expected during normal
 * routing and translated into a 404 by the HTTP layer.
 */
export class NotFoundError extends DetailedError {
  constructor({ site, path }: { site: string; path: string }) {
    super(`No mapping for ${site}${path}`, { site, path });
  }
}

/**
 * A mapping write would break the redirect rules. Raised before anything is
 * persisted or cached.
 */
export class ValidationError extends DetailedError {
  constructor(
    message: string,
    details: { site?: string; path?: string; statusCode?: number } = {},
  ) {
    super(message, details);
  }
}

// A content handler names a view that is not in the view registry
export class HandlerReferenceError extends DetailedError {
  constructor(view: string) {
    super(`Unknown view: ${view}`, { view });
  }
}
