/**
 * device-manager.ts — Current/previous snapshot pair with edge queries
 *
 * Each concrete manager (keyboard, mouse, joystick) only knows how to poll a
 * fresh snapshot. Press state, edges and axis readings are all derived here
 * from the two snapshots.
 *
 * Lifecycle per frame:
 *   manager.update();          // previous := current; current := poll()
 *   manager.justPressed("A");  // pure function of (previous, current)
 */

import type { NameTable } from "./name-table.js";
import { emptySnapshot, type DeviceSnapshot } from "./snapshot.js";
import { AXIS_PRESS_THRESHOLD, type InputDevice, type InputId, type RawInputSource } from "./types.js";

export abstract class DeviceManager<S extends DeviceSnapshot = DeviceSnapshot> {
  private _current:  S;
  private _previous: S;

  protected constructor(
    readonly device: InputDevice,
    readonly buttonNames: NameTable,
    readonly axisNames: NameTable,
    protected readonly source: RawInputSource
  ) {
    this._current  = this.blank();
    this._previous = this._current;
  }

  /** Captures a fresh snapshot from the raw source. */
  protected abstract poll(): S;

  /** The all-released snapshot used before the first update. */
  protected abstract blank(): S;

  get current(): S {
    return this._current;
  }

  get previous(): S {
    return this._previous;
  }

  /** Advances one frame. */
  update(): void {
    const next = this.poll();
    this._previous = this._current;
    this._current  = next;
  }

  /** Drops both snapshots back to the released state. */
  reset(): void {
    this._current  = this.blank();
    this._previous = this._current;
  }

  // ── Buttons ───────────────────────────────────────────────────────────

  isButton(id: InputId): boolean {
    return this.buttonNames.has(id);
  }

  isPressed(id: InputId): boolean {
    return buttonState(this._current, this.buttonNames.indexOf(id));
  }

  justPressed(id: InputId): boolean {
    const index = this.buttonNames.indexOf(id);
    return buttonState(this._current, index) && !buttonState(this._previous, index);
  }

  justReleased(id: InputId): boolean {
    const index = this.buttonNames.indexOf(id);
    return !buttonState(this._current, index) && buttonState(this._previous, index);
  }

  // ── Axes ──────────────────────────────────────────────────────────────

  isAxis(id: InputId): boolean {
    return this.axisNames.has(id);
  }

  getAxis(id: InputId): number {
    return axisValue(this._current, this.axisNames.indexOf(id));
  }

  getLastAxis(id: InputId): number {
    return axisValue(this._previous, this.axisNames.indexOf(id));
  }

  axisDelta(id: InputId): number {
    const index = this.axisNames.indexOf(id);
    return axisValue(this._current, index) - axisValue(this._previous, index);
  }

  /**
   * An axis is pressed when its value reaches AXIS_PRESS_THRESHOLD, or its
   * magnitude does when `bidirectional` is set.
   */
  axisIsPressed(id: InputId, bidirectional = false): boolean {
    return axisPressed(this.getAxis(id), bidirectional);
  }

  axisJustPressed(id: InputId, bidirectional = false): boolean {
    return axisPressed(this.getAxis(id), bidirectional) && !axisPressed(this.getLastAxis(id), bidirectional);
  }

  axisJustReleased(id: InputId, bidirectional = false): boolean {
    return !axisPressed(this.getAxis(id), bidirectional) && axisPressed(this.getLastAxis(id), bidirectional);
  }

  // ── Activity ──────────────────────────────────────────────────────────

  /** True when any button changed state between the two snapshots. */
  protected anyButtonEdge(): boolean {
    const now  = this._current.buttons;
    const then = this._previous.buttons;
    for (let i = 0; i < now.length; i++) if (now[i] !== then[i]) return true;
    return false;
  }

  /** True when any axis crossed the press threshold in either direction. */
  protected anyAxisEdge(): boolean {
    for (let i = 0; i < this.axisNames.size; i++) {
      if (this.axisJustPressed(i, true) || this.axisJustReleased(i, true)) return true;
    }
    return false;
  }

  /**
   * True when this frame produced input worth attributing to the device.
   * Defaults to button edges and axis threshold crossings.
   */
  hasActivity(): boolean {
    return this.anyButtonEdge() || this.anyAxisEdge();
  }

  protected emptyState(): DeviceSnapshot {
    return emptySnapshot(this.buttonNames.size, this.axisNames.size);
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function buttonState(snapshot: DeviceSnapshot, index: number | null): boolean {
  return index !== null && snapshot.buttons[index] === true;
}

function axisValue(snapshot: DeviceSnapshot, index: number | null): number {
  return index === null ? 0 : (snapshot.axes[index] ?? 0);
}

function axisPressed(value: number, bidirectional: boolean): boolean {
  return (bidirectional ? Math.abs(value) : value) >= AXIS_PRESS_THRESHOLD;
}
