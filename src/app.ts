/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import * as config from './config.js';
import log from './log.js';
import { createApp } from './routes/index.js';
import * as system from './system.js';

const app = createApp({
  log,
  resolver: system.resolver,
  dispatcher: system.contentDispatcher,
  siteDomain: config.SITE_DOMAIN,
});

const server = app.listen(config.PORT, () => {
  log.info(`Listening on port ${config.PORT}`, {
    views: system.viewRegistry.names(),
  });
});

system.registerCleanupHandler('http-server', async () => {
  await new Promise<void>((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
});

export { server };
