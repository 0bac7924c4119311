/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import type {
  ErrorRequestHandler,
  Handler,
  Request,
  Response,
} from 'express';
import asyncHandler from 'express-async-handler';
import winston from 'winston';

import { NotFoundError } from '../lib/error.js';
import * as metrics from '../metrics.js';
import { ContentDispatcher } from '../views/content-dispatcher.js';
import type { RouteResolver } from '../types.js';

const NOT_FOUND_MAX_AGE = 60; // seconds

export const sendNotFound = (res: Response) => {
  res.header('Cache-Control', `public, max-age=${NOT_FOUND_MAX_AGE}`);
  res.status(404).send('Not found');
};

// Malformed escapes are matched as sent
export const decodeRequestPath = (path: string): string => {
  try {
    return decodeURIComponent(path);
  } catch (error: unknown) {
    if (error instanceof URIError) {
      return path;
    }
    throw error;
  }
};

/**
 * Catch-all handler turning routing decisions into responses. Not-found is
 * passed on as a NotFoundError so the error handler renders the 404.
 */
export const createMappingHandler = ({
  log,
  resolver,
  dispatcher,
  siteDomain,
}: {
  log: winston.Logger;
  resolver: RouteResolver;
  dispatcher: ContentDispatcher;
  siteDomain?: string;
}): Handler =>
  asyncHandler(async (req: Request, res: Response) => {
    const site = siteDomain ?? req.hostname;
    const decision = await resolver.resolve(site, decodeRequestPath(req.path));

    switch (decision.kind) {
      case 'not-found':
        throw new NotFoundError({ site: decision.site, path: decision.path });
      case 'gone':
        res.status(410).end();
        return;
      case 'redirect':
        res.redirect(decision.permanent ? 301 : 302, decision.location);
        return;
      case 'status':
        res.status(decision.statusCode).end();
        return;
      case 'content':
        log.debug('Serving content', {
          site,
          path: decision.record.path,
          view: decision.handler.view,
        });
        await dispatcher.dispatch(
          { req, res, record: decision.record },
          decision.handler,
        );
        return;
    }
  });

export const createErrorHandler = ({
  log,
}: {
  log: winston.Logger;
}): ErrorRequestHandler => {
  return (error: unknown, req, res, next) => {
    if (res.headersSent) {
      next(error);
      return;
    }

    if (error instanceof NotFoundError) {
      sendNotFound(res);
      return;
    }

    metrics.errorsCounter.inc();
    log.error('Error handling request', {
      method: req.method,
      path: req.path,
      message: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
    res.status(500).send('Internal server error');
  };
};
