/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import winston from 'winston';

import { isViewOptions } from '../lib/mappings.js';
import * as metrics from '../metrics.js';
import type {
  ContentHandler,
  ViewContext,
  ViewResolver,
} from '../types.js';

/**
 * Runs the view named by a content handler. Class-style views are constructed
 * with `options.initkwargs` and handed the remaining options; function views
 * receive every option. An unknown view raises HandlerReferenceError, which
 * callers treat as an internal error rather than a routing outcome.
 */
export class ContentDispatcher {
  private log: winston.Logger;
  private views: ViewResolver;

  constructor({ log, views }: { log: winston.Logger; views: ViewResolver }) {
    this.log = log.child({ class: this.constructor.name });
    this.views = views;
  }

  async dispatch(context: ViewContext, handler: ContentHandler): Promise<void> {
    const log = this.log.child({
      view: handler.view,
      contentHandlerId: handler.id,
    });

    try {
      const view = this.views.resolve(handler.view);
      log.debug('Dispatching to view', { kind: view.kind });

      if (view.kind === 'function') {
        await view.fn(context, handler.options);
        return;
      }

      const { initkwargs, ...options } = handler.options;
      const instance = new view.cls(
        isViewOptions(initkwargs) ? initkwargs : {},
      );
      await instance.handle(context, options);
    } catch (error: unknown) {
      metrics.viewDispatchErrorsCounter.inc({ view: handler.view });
      log.error('View dispatch failed', {
        message: error instanceof Error ? error.message : String(error),
        stack: error instanceof Error ? error.stack : undefined,
      });
      throw error;
    }
  }
}
