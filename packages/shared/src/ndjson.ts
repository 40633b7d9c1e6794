/**
 * Line Buffer
 *
 * Accumulates raw socket/pipe data and emits complete lines. Handles partial
 * lines across `data` events. Used for the shell bridge NDJSON protocol and
 * for splitting finder output.
 *
 * Protocol: JSON.stringify escapes internal newlines, so raw \n
 * is an unambiguous message delimiter.
 */

export interface LineBufferOptions {
  /** Keep empty lines (finder output uses them for the query and key lines) */
  keepEmpty?: boolean;
}

export class LineBuffer {
  private buffer = "";
  private readonly keepEmpty: boolean;

  constructor(options: LineBufferOptions = {}) {
    this.keepEmpty = options.keepEmpty ?? false;
  }

  /** Feed raw data, returns array of complete lines */
  feed(chunk: string): string[] {
    this.buffer += chunk;
    const lines: string[] = [];
    let newlineIndex: number;
    while ((newlineIndex = this.buffer.indexOf("\n")) !== -1) {
      const line = this.buffer.slice(0, newlineIndex).replace(/\r$/, "");
      this.buffer = this.buffer.slice(newlineIndex + 1);
      if (this.keepEmpty || line.length > 0) {
        lines.push(line);
      }
    }
    return lines;
  }

  /** Return whatever is left after the last newline */
  flush(): string[] {
    const rest = this.buffer;
    this.buffer = "";
    return rest.length > 0 ? [rest.replace(/\r$/, "")] : [];
  }
}
