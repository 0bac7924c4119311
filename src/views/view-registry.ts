/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { HandlerReferenceError } from '../lib/error.js';
import type {
  RegisteredView,
  ViewClass,
  ViewFunction,
  ViewResolver,
} from '../types.js';

/**
 * Maps the view names stored on content handlers to the code that serves
 * them. Filled once at startup; lookups never fall back to loading code.
 */
export class ViewRegistry implements ViewResolver {
  private views = new Map<string, RegisteredView>();

  private register(name: string, view: RegisteredView): this {
    if (this.views.has(name)) {
      throw new Error(`View already registered: ${name}`);
    }
    this.views.set(name, view);
    return this;
  }

  registerFunction(name: string, fn: ViewFunction): this {
    return this.register(name, { kind: 'function', fn });
  }

  registerClass(name: string, cls: ViewClass): this {
    return this.register(name, { kind: 'class', cls });
  }

  has(name: string): boolean {
    return this.views.has(name);
  }

  resolve(name: string): RegisteredView {
    const view = this.views.get(name);
    if (view === undefined) {
      throw new HandlerReferenceError(name);
    }
    return view;
  }

  names(): string[] {
    return [...this.views.keys()].sort();
  }
}
