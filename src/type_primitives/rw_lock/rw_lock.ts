/***
 * RwLock — Scoped reader/writer guard around a single value.
 *
 * Any number of readers, or exactly one writer. The value is only ever
 * handed to a callback, and the guard is released in `finally` when the
 * callback returns or throws, so no borrowed reference outlives its lock.
 *
 * The core runs on one thread, so contention can only come from the call
 * stack itself: a callback that asks for a conflicting borrow of the
 * same lock (a write inside a read, or anything inside a write). Waiting
 * would never end, so the acquisition throws BORROW_CONFLICT instead.
 *
 *   const lock = new RwLock(new Map<number, string>(), "names");
 *   lock.read((m) => m.get(1));
 *   lock.write((m) => m.set(1, "a"));
 *   lock.write(() => lock.read(() => 0)); // throws BORROW_CONFLICT
 *
 ***/

import { PRIMITIVE_ERROR, PrimitiveError } from "../error";

export class RwLock<T> {
  private _value: T;
  private _readers = 0;
  private _writing = false;

  constructor(
    value: T,
    public readonly label: string = "lock",
  ) {
    this._value = value;
  }

  get is_read_locked(): boolean {
    return this._readers > 0;
  }

  get is_write_locked(): boolean {
    return this._writing;
  }

  read<R>(fn: (value: T) => R): R {
    if (this._writing) this.conflict("read");
    this._readers++;
    try {
      return fn(this._value);
    } finally {
      this._readers--;
    }
  }

  write<R>(fn: (value: T) => R): R {
    if (this._writing || this._readers > 0) this.conflict("write");
    this._writing = true;
    try {
      return fn(this._value);
    } finally {
      this._writing = false;
    }
  }

  /**
   * Store the result of fn(previous) under the write guard.
   * Returns the previous value.
   */
  update(fn: (prev: T) => T): T {
    return this.write((prev) => {
      this._value = fn(prev);
      return prev;
    });
  }

  replace(next: T): T {
    return this.update(() => next);
  }

  private conflict(mode: "read" | "write"): never {
    throw new PrimitiveError(
      PRIMITIVE_ERROR.BORROW_CONFLICT,
      `Cannot ${mode}-lock "${this.label}": it is already ${
        this._writing ? "write" : "read"
      }-locked further up the call stack`,
      { lock: this.label, mode, readers: this._readers, writing: this._writing },
    );
  }
}
