// src/core/objects/cell.ts
// Closure cells: shared single-value containers

const EMPTY: unique symbol = Symbol("ferry.empty-cell");

/**
 * A mutable slot shared by every function that closes over it.
 * Reading an empty cell throws, the same way reading an unassigned
 * closure variable does.
 */
export class Cell<T = unknown> {
  private contents: T | typeof EMPTY;

  constructor(...initial: [] | [T]) {
    this.contents = initial.length === 0 ? EMPTY : initial[0];
  }

  get value(): T {
    const contents = this.contents;
    if (contents === EMPTY) {
      throw new ReferenceError("cell variable referenced before assignment");
    }
    return contents;
  }

  set value(v: T) {
    this.contents = v;
  }

  get isEmpty(): boolean {
    return this.contents === EMPTY;
  }

  clear(): void {
    this.contents = EMPTY;
  }
}

export function cell<T>(...initial: [] | [T]): Cell<T> {
  return new Cell<T>(...initial);
}

export function isCell(x: unknown): x is Cell {
  return x instanceof Cell;
}
