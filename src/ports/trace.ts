/**
 * Trace event types emitted while reducing and rebuilding objects.
 */
export type TraceEvent =
  | { tag: "E_Resolve"; target: string; decision: "reference" | "value"; module?: string; reason?: string }
  | { tag: "E_Reduce"; target: string; strategy: string }
  | { tag: "E_Capture"; target: string; globals: number; cells: number; submodules: number }
  | { tag: "E_TrackClass"; target: string; trackingId: string }
  | { tag: "E_Skeleton"; target: string; trackingId: string; fresh: boolean }
  | { tag: "E_Refused"; target: string; reason: string }
  | { tag: "E_Dumps"; id: string; serializer: string; bytes: number; durationMs: number }
  | { tag: "E_Loads"; id: string; serializer: string; bytes: number; durationMs: number };

/**
 * Trace sink for logging events.
 */
export interface TraceSink {
  emit(event: TraceEvent): void;
}
