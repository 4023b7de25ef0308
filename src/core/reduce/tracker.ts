// src/core/reduce/tracker.ts
// Weak two-way registry between dynamic classes and their tracking ids

import { randomUUID } from "node:crypto";

/**
 * Class -> id is held weakly by a WeakMap; id -> class by a WeakRef whose
 * entry is dropped once the class is collected. Neither side keeps the
 * other alive.
 */
export class ClassTracker {
  private idsByClass: WeakMap<Function, string> = new WeakMap();
  private classesById: Map<string, WeakRef<Function>> = new Map();
  private cleanup = new FinalizationRegistry<string>(id => {
    const ref = this.classesById.get(id);
    if (ref && ref.deref() === undefined) this.classesById.delete(id);
  });

  /**
   * The class's tracking id, allocated on first use.
   */
  trackingId(cls: Function): string {
    const existing = this.idsByClass.get(cls);
    if (existing) return existing;
    const id = randomUUID();
    this.track(id, cls);
    return id;
  }

  lookup(id: string): Function | undefined {
    return this.classesById.get(id)?.deref();
  }

  /**
   * The class already tracked under `id`, or `cls` after tracking it under `id`.
   */
  lookupOrTrack(id: string, cls: Function): Function {
    const existing = this.lookup(id);
    if (existing) return existing;
    this.track(id, cls);
    return cls;
  }

  get size(): number {
    return this.classesById.size;
  }

  private track(id: string, cls: Function): void {
    this.idsByClass.set(cls, id);
    this.classesById.set(id, new WeakRef(cls));
    this.cleanup.register(cls, id);
  }
}
