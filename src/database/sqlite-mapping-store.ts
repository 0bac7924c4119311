/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import Sqlite from 'better-sqlite3';
import { fileURLToPath } from 'node:url';
import winston from 'winston';

import { canonicalizePath } from '../lib/canonical-path.js';
import { HandlerReferenceError, ValidationError } from '../lib/error.js';
import {
  DEFAULT_STATUS_CODE,
  GONE_STATUS_CODE,
  isRedirectStatus,
  isViewOptions,
  mappingDigest,
} from '../lib/mappings.js';
import loadSql from './sql-loader.js';
import type {
  ContentHandler,
  ContentHandlerInput,
  ContentHandlerStore,
  MappingInput,
  MappingRecord,
  MappingStore,
  ViewOptions,
  ViewResolver,
} from '../types.js';

interface MappingRow {
  id: number;
  site: string;
  path: string;
  digest: string;
  status_code: number;
  force_secure: number;
  target_id: number | null;
  target_site: string | null;
  target_path: string | null;
  target_status_code: number | null;
  target_force_secure: number | null;
  handler_id: number | null;
  handler_view: string | null;
  handler_options: string | null;
}

interface ContentHandlerRow {
  id: number;
  view: string;
  options: string;
}

interface MappingParams {
  site: string;
  path: string;
  digest: string;
  status_code: number;
  force_secure: number;
  redirect_target_id: number | null;
  content_handler_id: number | null;
}

function parseOptions(json: string | null): ViewOptions {
  const parsed: unknown = JSON.parse(json ?? '{}');
  return isViewOptions(parsed) ? parsed : {};
}

function rowToContentHandler(row: ContentHandlerRow): ContentHandler {
  return { id: row.id, view: row.view, options: parseOptions(row.options) };
}

function rowToMappingRecord(row: MappingRow): MappingRecord {
  const record: MappingRecord = {
    id: row.id,
    site: row.site,
    path: row.path,
    digest: row.digest,
    statusCode: row.status_code,
    forceSecure: row.force_secure === 1,
  };

  if (
    row.target_id !== null &&
    row.target_site !== null &&
    row.target_path !== null &&
    row.target_status_code !== null
  ) {
    record.redirectTarget = {
      id: row.target_id,
      site: row.target_site,
      path: row.target_path,
      statusCode: row.target_status_code,
      forceSecure: row.target_force_secure === 1,
    };
  }

  if (row.handler_id !== null && row.handler_view !== null) {
    record.contentHandler = {
      id: row.handler_id,
      view: row.handler_view,
      options: parseOptions(row.handler_options),
    };
  }

  return record;
}

function requireStatement(
  statements: Record<string, string>,
  name: string,
): string {
  const sql = statements[name];
  if (sql === undefined) {
    throw new Error(`Missing SQL statement: ${name}`);
  }
  return sql;
}

export class SqliteMappingStore implements MappingStore, ContentHandlerStore {
  private log: winston.Logger;
  private db: Sqlite.Database;
  private viewResolver: ViewResolver;

  private stmts: {
    selectMappingBySitePath: Sqlite.Statement<
      [{ site: string; path: string }],
      MappingRow
    >;
    selectMappingById: Sqlite.Statement<[{ id: number }], MappingRow>;
    countRedirectsToMapping: Sqlite.Statement<
      [{ id: number }],
      { count: number }
    >;
    insertMapping: Sqlite.Statement<[MappingParams]>;
    updateMapping: Sqlite.Statement<[MappingParams & { id: number }]>;
    selectContentHandlerById: Sqlite.Statement<
      [{ id: number }],
      ContentHandlerRow
    >;
    insertContentHandler: Sqlite.Statement<[{ view: string; options: string }]>;
    updateContentHandler: Sqlite.Statement<
      [{ id: number; view: string; options: string }]
    >;
  };

  private saveMappingFn: (input: MappingInput) => number;

  constructor({
    log,
    dbPath,
    viewResolver,
  }: {
    log: winston.Logger;
    dbPath: string;
    viewResolver: ViewResolver;
  }) {
    this.log = log.child({ class: this.constructor.name });
    this.viewResolver = viewResolver;

    this.db = new Sqlite(dbPath, { timeout: 30000 });
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('foreign_keys = ON');

    const schemaDir = fileURLToPath(new URL('./sql/schema', import.meta.url));
    for (const sql of Object.values(loadSql(schemaDir))) {
      this.db.exec(sql);
    }

    const sql = loadSql(
      fileURLToPath(new URL('./sql/mappings', import.meta.url)),
    );
    this.stmts = {
      selectMappingBySitePath: this.db.prepare<
        { site: string; path: string },
        MappingRow
      >(requireStatement(sql, 'selectMappingBySitePath')),
      selectMappingById: this.db.prepare<{ id: number }, MappingRow>(
        requireStatement(sql, 'selectMappingById'),
      ),
      countRedirectsToMapping: this.db.prepare<{ id: number }, { count: number }>(
        requireStatement(sql, 'countRedirectsToMapping'),
      ),
      insertMapping: this.db.prepare<MappingParams>(
        requireStatement(sql, 'insertMapping'),
      ),
      updateMapping: this.db.prepare<MappingParams & { id: number }>(
        requireStatement(sql, 'updateMapping'),
      ),
      selectContentHandlerById: this.db.prepare<
        { id: number },
        ContentHandlerRow
      >(requireStatement(sql, 'selectContentHandlerById')),
      insertContentHandler: this.db.prepare<{ view: string; options: string }>(
        requireStatement(sql, 'insertContentHandler'),
      ),
      updateContentHandler: this.db.prepare<{
        id: number;
        view: string;
        options: string;
      }>(requireStatement(sql, 'updateContentHandler')),
    };

    // Validation reads and the write happen in one transaction so a
    // concurrent writer cannot turn the target into a redirect in between
    this.saveMappingFn = this.db.transaction((input: MappingInput) => {
      const params = this.validateMapping(input);
      if (input.id === undefined) {
        return Number(this.stmts.insertMapping.run(params).lastInsertRowid);
      }
      this.stmts.updateMapping.run({ ...params, id: input.id });
      return input.id;
    });
  }

  private validateMapping(input: MappingInput): MappingParams {
    const site = input.site;
    const path = canonicalizePath(input.path);
    const statusCode = input.statusCode ?? DEFAULT_STATUS_CODE;
    const details = { site, path, statusCode };

    if (input.id !== undefined) {
      if (this.stmts.selectMappingById.get({ id: input.id }) === undefined) {
        throw new ValidationError(`Mapping ${input.id} does not exist`, details);
      }
    }

    const existing = this.stmts.selectMappingBySitePath.get({ site, path });
    if (existing !== undefined && existing.id !== input.id) {
      throw new ValidationError(
        `A mapping for ${site}${path} already exists`,
        details,
      );
    }

    if (isRedirectStatus(statusCode)) {
      if (input.redirectTargetId === undefined) {
        throw new ValidationError(
          `Status ${statusCode} requires a redirect target`,
          details,
        );
      }
      const target = this.stmts.selectMappingById.get({
        id: input.redirectTargetId,
      });
      if (target === undefined) {
        throw new ValidationError(
          `Redirect target ${input.redirectTargetId} does not exist`,
          details,
        );
      }
      if (
        target.id === input.id ||
        (target.site === site && target.path === path)
      ) {
        throw new ValidationError('A mapping cannot redirect to itself', details);
      }
      if (isRedirectStatus(target.status_code)) {
        throw new ValidationError(
          `Redirect target ${target.site}${target.path} is itself a redirect`,
          details,
        );
      }
      if (
        input.id !== undefined &&
        (this.stmts.countRedirectsToMapping.get({ id: input.id })?.count ?? 0) >
          0
      ) {
        throw new ValidationError(
          'A mapping other mappings redirect to cannot become a redirect',
          details,
        );
      }
    } else if (input.redirectTargetId !== undefined) {
      throw new ValidationError(
        `Status ${statusCode} cannot have a redirect target`,
        details,
      );
    }

    if (input.contentHandlerId !== undefined) {
      if (isRedirectStatus(statusCode) || statusCode === GONE_STATUS_CODE) {
        throw new ValidationError(
          `Status ${statusCode} cannot have a content handler`,
          details,
        );
      }
      const handler = this.stmts.selectContentHandlerById.get({
        id: input.contentHandlerId,
      });
      if (handler === undefined) {
        throw new ValidationError(
          `Content handler ${input.contentHandlerId} does not exist`,
          details,
        );
      }
    }

    return {
      site,
      path,
      digest: mappingDigest(site, path),
      status_code: statusCode,
      force_secure: input.forceSecure === true ? 1 : 0,
      redirect_target_id: input.redirectTargetId ?? null,
      content_handler_id: input.contentHandlerId ?? null,
    };
  }

  async findByKey(
    site: string,
    path: string,
  ): Promise<MappingRecord | undefined> {
    const row = this.stmts.selectMappingBySitePath.get({
      site,
      path: canonicalizePath(path),
    });
    return row !== undefined ? rowToMappingRecord(row) : undefined;
  }

  async findById(id: number): Promise<MappingRecord | undefined> {
    const row = this.stmts.selectMappingById.get({ id });
    return row !== undefined ? rowToMappingRecord(row) : undefined;
  }

  async save(input: MappingInput): Promise<MappingRecord> {
    const id = this.saveMappingFn(input);
    const row = this.stmts.selectMappingById.get({ id });
    if (row === undefined) {
      throw new Error(`Mapping ${id} missing after save`);
    }
    const record = rowToMappingRecord(row);
    this.log.info('Saved mapping', {
      id: record.id,
      site: record.site,
      path: record.path,
      statusCode: record.statusCode,
    });
    return record;
  }

  async create(input: Omit<MappingInput, 'id'>): Promise<MappingRecord> {
    return this.save(input);
  }

  async findContentHandlerById(
    id: number,
  ): Promise<ContentHandler | undefined> {
    const row = this.stmts.selectContentHandlerById.get({ id });
    return row !== undefined ? rowToContentHandler(row) : undefined;
  }

  async saveContentHandler(
    input: ContentHandlerInput,
  ): Promise<ContentHandler> {
    // Fail fast on views that could never be dispatched
    if (!this.viewResolver.has(input.view)) {
      throw new HandlerReferenceError(input.view);
    }

    const params = {
      view: input.view,
      options: JSON.stringify(input.options ?? {}),
    };
    let id: number;
    if (input.id === undefined) {
      id = Number(this.stmts.insertContentHandler.run(params).lastInsertRowid);
    } else {
      const { changes } = this.stmts.updateContentHandler.run({
        ...params,
        id: input.id,
      });
      if (changes === 0) {
        throw new ValidationError(`Content handler ${input.id} does not exist`);
      }
      id = input.id;
    }

    this.log.info('Saved content handler', { id, view: input.view });
    return { id, view: input.view, options: input.options ?? {} };
  }

  async createContentHandler(
    input: Omit<ContentHandlerInput, 'id'>,
  ): Promise<ContentHandler> {
    return this.saveContentHandler(input);
  }

  close(): void {
    this.db.close();
  }
}
