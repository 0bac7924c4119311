/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { Router } from 'express';
import asyncHandler from 'express-async-handler';

import * as metrics from '../metrics.js';

export const healthRouter = Router();

// Healthcheck
healthRouter.get('/urlmap/healthcheck', (_req, res) => {
  res.status(200).send({
    status: 'ok',
    uptime: process.uptime(),
    date: new Date(),
  });
});

healthRouter.get(
  '/urlmap/metrics',
  asyncHandler(async (_req, res) => {
    res.type(metrics.registry.contentType);
    res.send(await metrics.registry.metrics());
  }),
);
