/**
 * Dispatcher
 *
 * Routes decoded packets to registered methods.
 *
 *   - A method matches when its address pattern matches the message path and
 *     its type signature is a prefix of the message's type tags (an empty
 *     signature accepts anything).
 *   - Every matching method runs, in registration order.
 *   - If nothing matched, the first default method runs instead.
 *   - Bundles fire the start hook, their elements in order, then the end hook.
 *
 * Handlers and hooks never take the dispatcher down: whatever they throw (or
 * reject with) goes to the error handler and dispatch moves on.
 */

import { Bundle } from './bundle';
import { type OscErrorCode, toOscError } from './errors';
import { getLogger } from './logger';
import type { Message } from './message';
import type { Packet } from './packet';
import { type CompiledPattern, compilePattern } from './pattern';

const log = getLogger('Dispatcher');

export type MethodHandler = (message: Message, source: string) => void | Promise<void>;
export type BundleHook = (bundle: Bundle) => void;
export type ErrorHandler = (code: OscErrorCode, message: string, source: string) => void;

export interface Method {
  readonly id: number;
  readonly pathPattern: string;
  readonly typeSignature: string;
  readonly handler: MethodHandler;
  readonly isDefault: boolean;
}

interface RegisteredMethod extends Method {
  readonly matcher: CompiledPattern | null;
}

export class Dispatcher {
  private methods: Map<number, RegisteredMethod> = new Map();
  private nextId = 1;
  private bundleStart?: BundleHook;
  private bundleEnd?: BundleHook;
  private errorHandler: ErrorHandler = (code, message, source) => {
    log.warn({ code, source }, message);
  };

  // --- Registry ---

  /**
   * Register a handler. Throws PatternError for a malformed pattern.
   * Returns the method id for removeMethod().
   */
  addMethod(pathPattern: string, typeSignature: string | null, handler: MethodHandler): number {
    const matcher = compilePattern(pathPattern);
    const id = this.nextId++;
    this.methods.set(id, {
      id,
      pathPattern,
      typeSignature: typeSignature ?? '',
      handler,
      isDefault: false,
      matcher,
    });
    log.debug({ id, pathPattern, typeSignature }, 'Method added');
    return id;
  }

  /** Fallback for messages no other method matched */
  addDefaultMethod(handler: MethodHandler): number {
    const id = this.nextId++;
    this.methods.set(id, { id, pathPattern: '', typeSignature: '', handler, isDefault: true, matcher: null });
    return id;
  }

  removeMethod(id: number): boolean {
    return this.methods.delete(id);
  }

  clear(): void {
    this.methods.clear();
  }

  getMethods(): Method[] {
    return [...this.methods.values()].map(({ id, pathPattern, typeSignature, handler, isDefault }) => ({
      id,
      pathPattern,
      typeSignature,
      handler,
      isDefault,
    }));
  }

  get methodCount(): number {
    return this.methods.size;
  }

  setBundleHandlers(onStart?: BundleHook, onEnd?: BundleHook): void {
    this.bundleStart = onStart;
    this.bundleEnd = onEnd;
  }

  setErrorHandler(handler: ErrorHandler): void {
    this.errorHandler = handler;
  }

  // --- Dispatch ---

  /** Returns true when at least one handler (regular or default) ran */
  dispatch(packet: Packet, source = 'local'): boolean {
    if (packet instanceof Bundle) {
      return this.dispatchBundle(packet, source);
    }
    return this.dispatchMessage(packet, source);
  }

  dispatchMessage(message: Message, source = 'local'): boolean {
    // Snapshot so handlers can add or remove methods mid-dispatch
    const snapshot = [...this.methods.values()];
    const path = message.getPath();
    const tags = message.typeTags();

    let matched = false;
    for (const method of snapshot) {
      if (method.isDefault || method.matcher === null) continue;
      if (!method.matcher.matches(path)) continue;
      if (!tags.startsWith(method.typeSignature)) continue;
      matched = true;
      this.invoke(method, message, source);
    }

    if (matched) return true;

    const fallback = snapshot.find((m) => m.isDefault);
    if (fallback) {
      this.invoke(fallback, message, source);
      return true;
    }

    log.debug({ path, tags, source }, 'No method matched');
    return false;
  }

  dispatchBundle(bundle: Bundle, source = 'local'): boolean {
    this.runHook(this.bundleStart, bundle, source, 'bundle start');

    let handled = false;
    for (const element of bundle.elements) {
      const ran = element instanceof Bundle
        ? this.dispatchBundle(element, source)
        : this.dispatchMessage(element, source);
      handled = ran || handled;
    }

    this.runHook(this.bundleEnd, bundle, source, 'bundle end');
    return handled;
  }

  /** Forward a failure to the error handler, which itself must not throw */
  reportError(code: OscErrorCode, message: string, source: string): void {
    try {
      this.errorHandler(code, message, source);
    } catch (err) {
      log.error({ err, code, source }, `Error handler threw while reporting: ${message}`);
    }
  }

  private invoke(method: RegisteredMethod, message: Message, source: string): void {
    const where = `${source} ${message.getPath()}`;
    try {
      const result: unknown = method.handler(message, source);
      if (result instanceof Promise) {
        result.catch((err: unknown) => this.reportHandlerError(err, where));
      }
    } catch (err) {
      this.reportHandlerError(err, where);
    }
  }

  private runHook(hook: BundleHook | undefined, bundle: Bundle, source: string, what: string): void {
    if (!hook) return;
    try {
      hook(bundle);
    } catch (err) {
      this.reportHandlerError(err, `${source} ${what}`);
    }
  }

  private reportHandlerError(err: unknown, where: string): void {
    const oscErr = toOscError(err, 'ServerError');
    this.reportError(oscErr.code, oscErr.message, where);
  }
}
