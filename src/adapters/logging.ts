import type { TraceEvent, TraceSink } from "../ports/trace";
import type { Serializer } from "../core/pool/serializer";

function makeId(kind: string): string {
  const random = Math.random().toString(36).slice(2);
  return `${kind}:${Date.now()}:${random}`;
}

/**
 * Sink that drops every event.
 */
export const nullSink: TraceSink = {
  emit(): void {},
};

/**
 * Sink writing one line per event.
 */
export function consoleSink(log: (line: string) => void = console.log): TraceSink {
  return {
    emit(event: TraceEvent): void {
      const { tag, ...fields } = event;
      log(`[ferry] ${tag} ${JSON.stringify(fields)}`);
    },
  };
}

export type CollectingSink = TraceSink & {
  readonly events: TraceEvent[];
  ofTag<T extends TraceEvent["tag"]>(tag: T): Array<Extract<TraceEvent, { tag: T }>>;
  clear(): void;
};

/**
 * Sink keeping events in memory.
 */
export function collectingSink(): CollectingSink {
  const events: TraceEvent[] = [];
  return {
    events,
    emit(event: TraceEvent): void {
      events.push(event);
    },
    ofTag<T extends TraceEvent["tag"]>(tag: T): Array<Extract<TraceEvent, { tag: T }>> {
      return events.filter((e): e is Extract<TraceEvent, { tag: T }> => e.tag === tag);
    },
    clear(): void {
      events.length = 0;
    },
  };
}

/**
 * Wrap a serializer with timing events.
 */
export function loggingSerializer(inner: Serializer, sink: TraceSink): Serializer {
  return {
    name: inner.name,
    dumps(value: unknown): Buffer {
      const id = makeId("dumps");
      const start = Date.now();
      const bytes = inner.dumps(value);
      sink.emit({ tag: "E_Dumps", id, serializer: inner.name, bytes: bytes.length, durationMs: Date.now() - start });
      return bytes;
    },
    loads(bytes: Uint8Array): unknown {
      const id = makeId("loads");
      const start = Date.now();
      const value = inner.loads(bytes);
      sink.emit({ tag: "E_Loads", id, serializer: inner.name, bytes: bytes.length, durationMs: Date.now() - start });
      return value;
    },
  };
}
