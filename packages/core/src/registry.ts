/**
 * Resume registry: last session per resume key and the foreground window.
 *
 * One instance is injected into a `Finder`; nothing here is module state.
 */

import type { Contents, NormalizedOptions, SessionContext } from "./types.js";
import type { FinderWindow } from "./window.js";

export interface LastSession {
  opts: NormalizedOptions;
  contents: Contents;
}

/** Values a picker relaunched with `resume: true` picks up */
export interface ResumeValues {
  query?: string;
  search?: string;
  noEsc?: boolean | 2;
}

export class ResumeRegistry {
  private last: LastSession | undefined;
  private values = new Map<string, ResumeValues>();
  private foreground: FinderWindow | undefined;
  private context: SessionContext | undefined;

  setLast(opts: NormalizedOptions, contents: Contents): void {
    this.last = { opts, contents };
  }

  getLast(): LastSession | undefined {
    return this.last;
  }

  get(key: string): ResumeValues | undefined {
    return this.values.get(key);
  }

  set(key: string, values: ResumeValues): void {
    this.values.set(key, { ...this.values.get(key), ...values });
  }

  /**
   * Store the query the session ended with. Live sessions store it as the
   * search, already shell-ready.
   */
  recordQuery(opts: NormalizedOptions, query: string): void {
    opts.lastQuery = query;
    if (this.last?.opts === opts) this.last.opts.query = query;

    if (opts.fnReload !== undefined) {
      this.set(opts.resumeKey, { search: query, noEsc: true });
    } else {
      this.set(opts.resumeKey, { query });
    }
  }

  /**
   * Make `window` the foreground window; the previous one is hidden.
   */
  activate(window: FinderWindow): void {
    const previous = this.foreground;
    if (previous && previous !== window && !previous.isClosed()) previous.hide();
    this.foreground = window;
  }

  foregroundWindow(): FinderWindow | undefined {
    return this.foreground;
  }

  /** Forget `window` if it is still the foreground one */
  release(window: FinderWindow): boolean {
    if (this.foreground !== window) return false;
    this.foreground = undefined;
    return true;
  }

  setContext(context: SessionContext): void {
    this.context = context;
  }

  getContext(): SessionContext | undefined {
    return this.context;
  }

  clearContext(): void {
    this.context = undefined;
  }
}
