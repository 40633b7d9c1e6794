/**
 * Contents helpers: type guards and the combiner that merges an array of
 * sources into one contents value.
 */

import { ConfigurationError, invariant } from "@finderkit/shared";
import type { Contents, ContentsProducer, ContentsSource, EmitFn, Entry } from "./types.js";

export function isEntryList(value: unknown): value is readonly Entry[] {
  return Array.isArray(value);
}

export function isSourceList(value: Contents): value is readonly ContentsSource[] {
  if (!isEntryList(value) || value.length === 0) return false;
  const first: unknown = value[0];
  return typeof first === "object" && first !== null && "contents" in first;
}

function withPrefix(prefix: string | undefined, entry: Entry): Entry {
  return prefix ? `${prefix}${entry}` : entry;
}

/**
 * Drain one producer into `emit`, resolving at its end-of-stream.
 *
 * End-of-stream is `emit(undefined)`; for a producer returning a promise,
 * settling the promise also ends it. A producer that emits synchronously
 * resolves before the caller awaits, an asynchronous one resolves later.
 */
function drain(produce: ContentsProducer, prefix: string | undefined, emit: EmitFn): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    let ended = false;
    const end = () => {
      if (ended) return;
      ended = true;
      resolve();
    };
    const forward: EmitFn = (entry, flushed) => {
      if (ended) return;
      if (entry === undefined) {
        end();
        return;
      }
      emit(withPrefix(prefix, entry), flushed);
    };
    try {
      const result = produce(forward);
      if (result instanceof Promise) {
        result.then(end, (err: unknown) => {
          ended = true;
          reject(err);
        });
      }
    } catch (err) {
      ended = true;
      reject(err);
    }
  });
}

/**
 * Combine several sources into a single contents value.
 *
 * Lists are concatenated with each source's prefix applied per entry.
 * Producers are drained in declared order: every entry of source i is
 * emitted before any entry of source i+1, and a single end-of-stream follows
 * the last source.
 */
export function combineContents(sources: readonly ContentsSource[]): readonly Entry[] | ContentsProducer {
  invariant(sources.length > 0, "must supply at least one contents source");
  const first = sources[0].contents;

  if (typeof first !== "function" && !isEntryList(first)) {
    throw new ConfigurationError("Combining string contents is not supported");
  }

  if (isEntryList(first)) {
    const combined: Entry[] = [];
    for (const source of sources) {
      const list = source.contents;
      invariant(isEntryList(list), "Unable to combine contents of different types");
      for (const entry of list) {
        combined.push(withPrefix(source.prefix, entry));
      }
    }
    return combined;
  }

  for (const source of sources) {
    invariant(typeof source.contents === "function", "Unable to combine contents of different types");
  }

  return async (emit) => {
    for (const source of sources) {
      const produce = source.contents;
      if (typeof produce !== "function") continue;
      await drain(produce, source.prefix, emit);
    }
    emit(undefined);
  };
}

/**
 * Collect every entry a producer emits (until end-of-stream).
 */
export async function collectEntries(produce: ContentsProducer): Promise<Entry[]> {
  const entries: Entry[] = [];
  await drain(produce, undefined, (entry) => {
    if (entry !== undefined) entries.push(entry);
  });
  return entries;
}
