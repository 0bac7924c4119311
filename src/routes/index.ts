/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import express from 'express';
import winston from 'winston';

import { ContentDispatcher } from '../views/content-dispatcher.js';
import type { RouteResolver } from '../types.js';
import { healthRouter } from './health.js';
import { createErrorHandler, createMappingHandler } from './mappings.js';

export const createApp = ({
  log,
  resolver,
  dispatcher,
  siteDomain,
}: {
  log: winston.Logger;
  resolver: RouteResolver;
  dispatcher: ContentDispatcher;
  siteDomain?: string;
}): express.Express => {
  const app = express();

  app.disable('x-powered-by');

  app.use(healthRouter);
  app.use(createMappingHandler({ log, resolver, dispatcher, siteDomain }));
  app.use(createErrorHandler({ log }));

  return app;
};
