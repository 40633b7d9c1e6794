/**
 * The surface a finder session runs in.
 */

import { Logger, notify } from "@finderkit/shared";
import type { Previewer } from "./previewer.js";
import type { NormalizedOptions } from "./types.js";

const log = Logger.for("FinderWindow");

/** Exit codes that end a session normally: match, no match, interrupted */
export const OK_EXIT_CODES: readonly number[] = [0, 1, 130];

export interface FinderWindow {
  /** Reason the window cannot be opened, `undefined` when it can */
  canOpen(): string | undefined;
  create(): void | Promise<void>;
  attachPreviewer(previewer: Previewer | undefined): void;
  /** Width available to the finder */
  columns(noFullscreen?: boolean): number;
  /** `<position>:<size>` for the preview in the current geometry */
  previewLayout(): string;
  /** Report an abnormal exit; `true` when the code is a normal one */
  checkExitStatus(exitCode: number): boolean;
  autoclose(): boolean;
  close(): void;
  hide(): void;
  /** Bring a hidden session back; `false` when there is none */
  unhide(): boolean;
  wasHidden(): boolean;
  isClosed(): boolean;
}

export interface TerminalStreams {
  stdin: { isTTY?: boolean };
  stdout: { isTTY?: boolean; columns?: number };
}

/**
 * Window backed by the controlling terminal. The finder draws on it
 * directly, so there is nothing to hide or restore.
 */
export class TerminalWindow implements FinderWindow {
  private closed = false;
  private previewer: Previewer | undefined;

  constructor(
    private readonly opts: NormalizedOptions,
    private readonly streams: TerminalStreams = process,
  ) {}

  canOpen(): string | undefined {
    if (!this.streams.stdin.isTTY && !this.streams.stdout.isTTY) {
      return "no terminal attached to stdin or stdout";
    }
    return undefined;
  }

  create(): void {
    this.closed = false;
    log.debug({ columns: this.columns(), previewer: Boolean(this.previewer) }, "window created");
  }

  attachPreviewer(previewer: Previewer | undefined): void {
    this.previewer = previewer;
  }

  columns(): number {
    return this.streams.stdout.columns ?? 80;
  }

  previewLayout(): string {
    const preview = this.opts.winopts.preview;
    switch (preview.layout) {
      case "horizontal":
        return preview.horizontal;
      case "vertical":
        return preview.vertical;
      default:
        return this.columns() > preview.flipColumns ? preview.horizontal : preview.vertical;
    }
  }

  checkExitStatus(exitCode: number): boolean {
    if (OK_EXIT_CODES.includes(exitCode)) return true;
    log.error({ exitCode, finder: this.opts.finder.toString() }, "finder exited abnormally");
    notify.error(`${this.opts.finder.bin} exited with code ${exitCode}`);
    return false;
  }

  autoclose(): boolean {
    return this.opts.autoclose !== false;
  }

  close(): void {
    this.closed = true;
  }

  hide(): void {}

  unhide(): boolean {
    return false;
  }

  wasHidden(): boolean {
    return false;
  }

  isClosed(): boolean {
    return this.closed;
  }
}
