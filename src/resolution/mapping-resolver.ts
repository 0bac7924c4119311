/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import winston from 'winston';

import { canonicalizePath } from '../lib/canonical-path.js';
import {
  GONE_STATUS_CODE,
  PERMANENT_REDIRECT_STATUS_CODE,
  isRedirectStatus,
  mappingUrl,
} from '../lib/mappings.js';
import * as metrics from '../metrics.js';
import type {
  MappingRecord,
  MappingStore,
  RouteResolver,
  RoutingDecision,
} from '../types.js';

export class MappingResolver implements RouteResolver {
  private log: winston.Logger;
  private mappings: MappingStore;

  constructor({
    log,
    mappings,
  }: {
    log: winston.Logger;
    mappings: MappingStore;
  }) {
    this.log = log.child({ class: this.constructor.name });
    this.mappings = mappings;
  }

  async resolve(site: string, rawPath: string): Promise<RoutingDecision> {
    const path = canonicalizePath(rawPath);
    const canonicalMismatch = path !== rawPath;

    const record = await this.mappings.findByKey(site, path);
    const decision: RoutingDecision =
      record === undefined
        ? { kind: 'not-found', site, path }
        : this.decide(record, canonicalMismatch);

    metrics.routingDecisionsCounter.inc({ kind: decision.kind });
    this.log.debug('Resolved path', {
      site,
      rawPath,
      path,
      kind: decision.kind,
    });

    return decision;
  }

  private decide(
    record: MappingRecord,
    canonicalMismatch: boolean,
  ): RoutingDecision {
    if (isRedirectStatus(record.statusCode)) {
      // Targets are never redirects themselves, so one hop is enough
      if (record.redirectTarget === undefined) {
        throw new Error(
          `Redirect mapping ${record.id} is missing its redirect target`,
        );
      }
      return {
        kind: 'redirect',
        permanent: record.statusCode === PERMANENT_REDIRECT_STATUS_CODE,
        location: mappingUrl(record.redirectTarget),
        record,
      };
    }

    if (canonicalMismatch) {
      return {
        kind: 'redirect',
        permanent: true,
        location: mappingUrl(record),
        record,
      };
    }

    if (record.statusCode === GONE_STATUS_CODE) {
      return { kind: 'gone', record };
    }

    if (record.contentHandler !== undefined) {
      return { kind: 'content', handler: record.contentHandler, record };
    }

    return { kind: 'status', statusCode: record.statusCode, record };
  }
}
