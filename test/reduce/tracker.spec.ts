// test/reduce/tracker.spec.ts
// Tracking ids of dynamic classes

import { describe, it, expect } from "vitest";
import { ClassTracker } from "../../src/core/reduce/tracker";

describe("ClassTracker", () => {
  it("allocates one stable id per class", () => {
    const tracker = new ClassTracker();
    class A {}
    class B {}
    const id = tracker.trackingId(A);
    expect(tracker.trackingId(A)).toBe(id);
    expect(tracker.trackingId(B)).not.toBe(id);
    expect(tracker.lookup(id)).toBe(A);
    expect(tracker.size).toBe(2);
  });

  it("returns the class already bound to an id", () => {
    const tracker = new ClassTracker();
    class A {}
    class Copy {}
    const id = tracker.trackingId(A);
    expect(tracker.lookupOrTrack(id, Copy)).toBe(A);
  });

  it("binds an unknown id to the given class", () => {
    const tracker = new ClassTracker();
    class Remote {}
    expect(tracker.lookupOrTrack("remote-id", Remote)).toBe(Remote);
    expect(tracker.trackingId(Remote)).toBe("remote-id");
    expect(tracker.lookup("remote-id")).toBe(Remote);
  });

  it("knows nothing of unknown ids", () => {
    expect(new ClassTracker().lookup("missing")).toBeUndefined();
  });
});
