/**
 * Previewers
 *
 * A previewer contributes to the finder command line through a fixed set of
 * optional capabilities. The CLI compiler asks for each by name and uses
 * whatever the previewer provides.
 */

import type { PreviewSource } from "./types.js";

export interface PreviewerCapabilities {
  /** Preview command (or callback) handed to `--preview` */
  cmdline(): PreviewSource;
  /** Replaces the computed `--preview-window` value */
  previewWindow(): string;
  /** `--delimiter` the preview placeholders rely on */
  delimiter(): string;
  /** Extra action run on the finder's `zero` event */
  zero(): string;
  /** Scroll offset appended to the preview window, e.g. `+{2}-/2` */
  previewOffset(): string;
}

export type PreviewerCapability = keyof PreviewerCapabilities;

export interface Previewer {
  capability<K extends PreviewerCapability>(name: K): PreviewerCapabilities[K] | undefined;
}

/**
 * Build a previewer from a partial capability table.
 */
export function definePreviewer(caps: Partial<PreviewerCapabilities>): Previewer {
  return {
    capability<K extends PreviewerCapability>(name: K): PreviewerCapabilities[K] | undefined {
      return caps[name];
    },
  };
}

export interface CommandPreviewerOptions {
  /** Base command, e.g. `bat --style=numbers --color=always` */
  cmd: string;
  /** Placeholder holding the file (default `{1}`) */
  fileField?: string;
  /** Placeholder holding the line number, enables line highlighting and offset */
  lineField?: string;
  delimiter?: string;
}

/**
 * Previews `path:line:...` entries with an external command.
 */
export class CommandPreviewer implements Previewer {
  private readonly caps: Partial<PreviewerCapabilities>;

  constructor(private readonly options: CommandPreviewerOptions) {
    const { lineField } = options;
    const caps: Partial<PreviewerCapabilities> = {
      cmdline: () => this.commandLine(),
      delimiter: () => options.delimiter ?? ":",
    };
    if (lineField) {
      caps.previewOffset = () => `+${asPlaceholder(lineField)}-/2`;
    }
    this.caps = caps;
  }

  capability<K extends PreviewerCapability>(name: K): PreviewerCapabilities[K] | undefined {
    return this.caps[name];
  }

  private commandLine(): string {
    const { cmd, fileField = "{1}", lineField } = this.options;
    const isBat = /^(bat|batcat)\b/.test(cmd);
    if (isBat && lineField) return `${cmd} --highlight-line=${lineField} ${fileField}`;
    return `${cmd} ${fileField}`;
  }
}

/** `2` → `{2}` */
function asPlaceholder(field: string): string {
  return field.startsWith("{") ? field : `{${field}}`;
}

/** `bat` when installed, else `cat`. */
export function defaultPreviewCommand(hasBat: boolean): string {
  return hasBat ? "bat --style=numbers --color=always" : "cat";
}
