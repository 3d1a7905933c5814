/**
 * snapshot.ts — Frozen per-frame device state
 *
 * A snapshot is created once per device per frame and never mutated; a
 * manager advances by replacing references, never by copying into an
 * existing snapshot.
 */

import type { Vec2 } from "./types.js";

export interface DeviceSnapshot {
  readonly buttons: ReadonlyArray<boolean>;
  readonly axes:    ReadonlyArray<number>;
}

export interface MouseSnapshot extends DeviceSnapshot {
  readonly position: Readonly<Vec2>;
}

/**
 * Copies `values` into an array of exactly `size` entries, padding with
 * `fill` or truncating as needed.
 */
function fit<T>(values: ReadonlyArray<T>, size: number, fill: T): T[] {
  const out = new Array<T>(size);
  for (let i = 0; i < size; i++) out[i] = i < values.length ? (values[i] ?? fill) : fill;
  return out;
}

export function createSnapshot(
  buttons: ReadonlyArray<boolean>,
  axes: ReadonlyArray<number>,
  buttonCount: number,
  axisCount: number
): DeviceSnapshot {
  return Object.freeze({
    buttons: Object.freeze(fit(buttons, buttonCount, false)),
    axes:    Object.freeze(fit(axes, axisCount, 0)),
  });
}

export function createMouseSnapshot(
  position: Readonly<Vec2>,
  buttons: ReadonlyArray<boolean>,
  buttonCount: number
): MouseSnapshot {
  return Object.freeze({
    buttons:  Object.freeze(fit(buttons, buttonCount, false)),
    axes:     Object.freeze([position.x, position.y]),
    position: Object.freeze({ x: position.x, y: position.y }),
  });
}

/** All buttons released, all axes at zero. */
export function emptySnapshot(buttonCount: number, axisCount: number): DeviceSnapshot {
  return createSnapshot([], [], buttonCount, axisCount);
}
