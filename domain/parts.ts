/**
 * Parts — ordered, read-only collection of part role players.
 * Wraps an array instead of extending one; only traversal and spares are exposed.
 */

import type { PartRole, PartsRole } from "./core.js";
import { InvalidArgumentError } from "./errors.js";

function isIterable(value: unknown): value is Iterable<unknown> {
  if (typeof value === "string") return false;
  return (
    typeof value === "object" &&
    value !== null &&
    Symbol.iterator in value &&
    typeof value[Symbol.iterator] === "function"
  );
}

export class Parts<T extends PartRole = PartRole> implements PartsRole<T>, Iterable<T> {
  private readonly items: readonly T[];

  constructor(items: Iterable<T>) {
    if (!isIterable(items)) {
      throw new InvalidArgumentError("Parts requires an iterable of parts", {
        received: items === null ? "null" : typeof items,
      });
    }
    // Arrays are held as given; other iterables are drained once.
    this.items = Array.isArray(items) ? items : Array.from(items);
  }

  /** Collection constructor usable as a factory seam. */
  static from<T extends PartRole>(items: Iterable<T>): Parts<T> {
    return new Parts(items);
  }

  /** Items with needsSpare set, in original order. New array on every call. */
  spares(): T[] {
    return this.items.filter((part) => part.needsSpare);
  }

  size(): number {
    return this.items.length;
  }

  /** Fresh iterator over items in insertion order. */
  *iterate(): Generator<T, void, undefined> {
    for (const part of this.items) yield part;
  }

  [Symbol.iterator](): Iterator<T> {
    return this.iterate();
  }

  /** First item with the given name. */
  find(name: string): T | undefined {
    return this.items.find((part) => part.name === name);
  }
}
