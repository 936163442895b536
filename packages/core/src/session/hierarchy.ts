/**
 * Tracks the stack of open scopes that supplies each new
 * event's default `parent_event_id`.
 *
 * Stacks live in AsyncLocalStorage and are never mutated in place: opening or
 * closing a scope enters a new stack for the current async call chain, so
 * chains that have forked (across an `await`, a timer, or
 * {@link HierarchyTracker.runInScope}) stop seeing each other's frames.
 *
 * The synchronous start of an async function runs in its caller's context.
 * A scope opened there, before the first `await`, is visible to siblings the
 * same caller starts afterwards in the same tick; `runInScope` gives each
 * sibling its own context from the start.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { ScopeOrderError } from '../errors.js';

/** Handle for one open scope; pass it back to `scopeEnd`. */
export interface ScopeToken {
  readonly eventId: string;
  /** 1 for the outermost scope of a stack. */
  readonly depth: number;
}

interface ScopeStack {
  /** Stacks from before the last `reset()` count as empty. */
  readonly generation: number;
  readonly frames: readonly ScopeToken[];
}

export class HierarchyTracker {
  private readonly storage = new AsyncLocalStorage<ScopeStack>();
  private generation = 0;

  private frames(): readonly ScopeToken[] {
    const stack = this.storage.getStore();
    return stack && stack.generation === this.generation ? stack.frames : [];
  }

  private enter(frames: readonly ScopeToken[]): void {
    this.storage.enterWith({ generation: this.generation, frames });
  }

  /** Open a scope for `eventId` on the current async chain's stack. */
  scopeBegin(eventId: string): ScopeToken {
    const frames = this.frames();
    const token: ScopeToken = Object.freeze({ eventId, depth: frames.length + 1 });
    this.enter([...frames, token]);
    return token;
  }

  /**
   * Close the innermost open scope and return its event id.
   *
   * @throws {ScopeOrderError} If no scope is open, or `token` is not the innermost one
   */
  scopeEnd(token?: ScopeToken): string {
    const frames = this.frames();
    const top = frames[frames.length - 1];
    if (top === undefined) {
      throw new ScopeOrderError(
        `scopeEnd called with no open scope${token ? ` (closing ${token.eventId})` : ''}`,
        null,
        token?.eventId ?? null,
      );
    }
    if (token !== undefined && token !== top) {
      throw new ScopeOrderError(
        `Scopes must close innermost first: ${top.eventId} is open inside ${token.eventId}`,
        top.eventId,
        token.eventId,
      );
    }
    this.enter(frames.slice(0, -1));
    return top.eventId;
  }

  /** Event id of the innermost open scope, or null at top level. */
  currentParent(): string | null {
    const frames = this.frames();
    return frames[frames.length - 1]?.eventId ?? null;
  }

  /** Number of open scopes on the current stack. */
  depth(): number {
    return this.frames().length;
  }

  /** Open scope ids, outermost first. */
  snapshot(): string[] {
    return this.frames().map((frame) => frame.eventId);
  }

  /**
   * Run `fn` inside a scope for `eventId`, in an async context of its own
   * that starts from the caller's stack. The scope is closed when `fn`
   * returns, throws, or (for async functions) settles.
   */
  runInScope<T>(eventId: string, fn: () => Promise<T>): Promise<T>;
  runInScope<T>(eventId: string, fn: () => T): T;
  runInScope<T>(eventId: string, fn: () => T | Promise<T>): T | Promise<T> {
    const inherited: ScopeStack = { generation: this.generation, frames: this.frames() };
    return this.storage.run(inherited, () => {
      const token = this.scopeBegin(eventId);
      let result: T | Promise<T>;
      try {
        result = fn();
      } catch (err) {
        this.scopeEnd(token);
        throw err;
      }
      if (result instanceof Promise) {
        return result.finally(() => {
          this.scopeEnd(token);
        });
      }
      this.scopeEnd(token);
      return result;
    });
  }

  /** Drop every open scope, on every async chain. */
  reset(): void {
    this.generation += 1;
  }
}
