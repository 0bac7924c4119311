/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import type {
  ViewContext,
  ViewFunction,
  ViewInstance,
  ViewOptions,
} from '../types.js';
import { ViewRegistry } from './view-registry.js';

const statusOrDefault = (value: unknown, context: ViewContext): number =>
  typeof value === 'number' && Number.isInteger(value)
    ? value
    : context.record.statusCode;

// Class-style view answering with a fixed body from its initkwargs
export class TextView implements ViewInstance {
  private body: string;
  private contentType: string;
  private status: number | undefined;

  constructor(initkwargs: ViewOptions) {
    this.body = typeof initkwargs.body === 'string' ? initkwargs.body : '';
    this.contentType =
      typeof initkwargs.contentType === 'string'
        ? initkwargs.contentType
        : 'text/plain; charset=utf-8';
    this.status =
      typeof initkwargs.status === 'number' ? initkwargs.status : undefined;
  }

  handle(context: ViewContext): void {
    context.res
      .status(statusOrDefault(this.status, context))
      .type(this.contentType)
      .send(this.body);
  }
}

// Function view answering with `options.body` as JSON
export const jsonView: ViewFunction = (context, options) => {
  context.res
    .status(statusOrDefault(options.status, context))
    .json(options.body ?? null);
};

export function registerBuiltinViews(registry: ViewRegistry): ViewRegistry {
  return registry
    .registerClass('text', TextView)
    .registerFunction('json', jsonView);
}
