/**
 * name-table.ts — Bidirectional symbolic name ↔ index table
 *
 * Pure module — no I/O, fully unit-testable.
 *
 * Binding files store symbolic names ("LeftStickX", "Space") while runtime
 * code often passes indices, so `parse` accepts either form:
 *
 *   table.parse("LeftStickX") → { ok: true, value: 0 }
 *   table.parse("leftstickx") → { ok: true, value: 0 }   (case-insensitive)
 *   table.parse("0")          → { ok: true, value: 0 }   (decimal index)
 *   table.parse(0)            → { ok: true, value: 0 }
 *   table.parse("Nope")       → { ok: false, error: "..." }
 */

import type { InputId, ParseResult } from "./types.js";

const DECIMAL_INDEX = /^\d+$/;

export class NameTable {
  private readonly _names: ReadonlyArray<string>;
  private readonly _byName: ReadonlyMap<string, number>;

  /**
   * @param label  Used in parse error messages, e.g. "joystick axis"
   * @param names  Symbolic names in index order; must be unique ignoring case
   */
  constructor(readonly label: string, names: ReadonlyArray<string>) {
    this._names = [...names];
    const byName = new Map<string, number>();
    names.forEach((name, index) => {
      const key = name.toLowerCase();
      if (byName.has(key)) throw new Error(`Duplicate ${label} name: ${name}`);
      byName.set(key, index);
    });
    this._byName = byName;
  }

  get size(): number {
    return this._names.length;
  }

  get names(): ReadonlyArray<string> {
    return this._names;
  }

  /** Canonical name for an index, or undefined when out of range. */
  nameOf(index: number): string | undefined {
    return this._names[index];
  }

  parse(id: InputId): ParseResult<number> {
    if (typeof id === "number") {
      if (Number.isInteger(id) && id >= 0 && id < this.size) return { ok: true, value: id };
      return { ok: false, error: `${this.label} index ${id} is out of range (0-${this.size - 1})` };
    }

    const trimmed = id.trim();
    if (trimmed === "") return { ok: false, error: `${this.label} name is empty` };

    const named = this._byName.get(trimmed.toLowerCase());
    if (named !== undefined) return { ok: true, value: named };

    if (DECIMAL_INDEX.test(trimmed)) return this.parse(parseInt(trimmed, 10));

    return { ok: false, error: `"${trimmed}" is not a valid ${this.label}` };
  }

  has(id: InputId): boolean {
    return this.parse(id).ok;
  }

  /** Index for a valid id, or null. */
  indexOf(id: InputId): number | null {
    const result = this.parse(id);
    return result.ok ? result.value : null;
  }
}
