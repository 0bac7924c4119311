/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import type { Request, Response } from 'express';

//
// Key/value stores
//

export type KVBufferStore = {
  get(key: string): Promise<Buffer | undefined>;
  set(key: string, buffer: Buffer): Promise<void>;
  del(key: string): Promise<void>;
  has(key: string): Promise<boolean>;
  close(): Promise<void>;
};

//
// Content handlers
//

export type ViewOptionValue =
  | string
  | number
  | boolean
  | null
  | ViewOptionValue[]
  | { [key: string]: ViewOptionValue };

export type ViewOptions = { [key: string]: ViewOptionValue };

export interface ContentHandler {
  id: number;
  // view registry key
  view: string;
  options: ViewOptions;
}

export interface ContentHandlerInput {
  id?: number;
  view: string;
  options?: ViewOptions;
}

export interface ContentHandlerStore {
  createContentHandler(
    input: Omit<ContentHandlerInput, 'id'>,
  ): Promise<ContentHandler>;
  saveContentHandler(input: ContentHandlerInput): Promise<ContentHandler>;
  findContentHandlerById(id: number): Promise<ContentHandler | undefined>;
}

//
// Mappings
//

/**
 * The parts of a redirect target needed to build its URL. Loaded together
 * with the redirecting record so a redirect costs a single store read.
 */
export interface RedirectTarget {
  id: number;
  site: string;
  path: string;
  statusCode: number;
  forceSecure: boolean;
}

export interface MappingRecord {
  id: number;
  site: string;
  path: string;
  digest: string;
  statusCode: number;
  forceSecure: boolean;
  redirectTarget?: RedirectTarget;
  contentHandler?: ContentHandler;
}

export interface MappingInput {
  id?: number;
  site: string;
  path: string;
  statusCode?: number;
  forceSecure?: boolean;
  redirectTargetId?: number;
  contentHandlerId?: number;
}

export interface MappingStore {
  findByKey(site: string, path: string): Promise<MappingRecord | undefined>;
  findById(id: number): Promise<MappingRecord | undefined>;
  create(input: Omit<MappingInput, 'id'>): Promise<MappingRecord>;
  save(input: MappingInput): Promise<MappingRecord>;
}

//
// Routing
//

export type RoutingDecision =
  | { kind: 'not-found'; site: string; path: string }
  | { kind: 'gone'; record: MappingRecord }
  | {
      kind: 'redirect';
      permanent: boolean;
      location: string;
      record: MappingRecord;
    }
  | { kind: 'content'; handler: ContentHandler; record: MappingRecord }
  | { kind: 'status'; statusCode: number; record: MappingRecord };

export type RoutingDecisionKind = RoutingDecision['kind'];

export interface RouteResolver {
  resolve(site: string, rawPath: string): Promise<RoutingDecision>;
}

//
// Views
//

export interface ViewContext {
  req: Request;
  res: Response;
  record: MappingRecord;
}

export type ViewFunction = (
  context: ViewContext,
  options: ViewOptions,
) => void | Promise<void>;

export interface ViewInstance {
  handle(context: ViewContext, options: ViewOptions): void | Promise<void>;
}

export type ViewClass = new (initkwargs: ViewOptions) => ViewInstance;

export type RegisteredView =
  | { kind: 'function'; fn: ViewFunction }
  | { kind: 'class'; cls: ViewClass };

export interface ViewResolver {
  has(name: string): boolean;
  resolve(name: string): RegisteredView;
}
