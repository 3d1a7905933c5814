/**
 * virtual-source.ts — In-process RawInputSource
 *
 * Holds keyboard, mouse and joystick state in memory and lets callers set it
 * directly. Used for headless runs (servers, replays, scripted input) and as
 * the default source when no hardware backend is supplied.
 *
 * Usage:
 *   const source = new VirtualInputSource();
 *   const input  = new Input(source);
 *   source.pressKey("Space");
 *   input.update();
 *   input.justPressed("Keyboard", "Space"); // true
 *
 * Identifiers accept the same names and indices as the device managers;
 * unknown identifiers are logged and ignored.
 */

import { logger } from "../../logger.js";
import type { NameTable } from "./name-table.js";
import { JOYSTICK_AXES, JOYSTICK_BUTTONS, KEYBOARD_KEYS, MOUSE_BUTTONS } from "./names.js";
import type { InputId, RawInputSource, RawJoystickState, RawMouseState, Vec2 } from "./types.js";

const log = logger.child({ module: "virtual-source" });

interface VirtualJoystick {
  buttons: boolean[];
  axes:    number[];
}

export class VirtualInputSource implements RawInputSource {
  private readonly _keys = new Set<number>();
  private readonly _mouseButtons = new Set<number>();
  private _mousePosition: Vec2 = { x: 0, y: 0 };
  private readonly _joysticks = new Map<number, VirtualJoystick>();

  // ── Keyboard ──────────────────────────────────────────────────────────

  pressKey(key: InputId): this {
    return this.toggle(this._keys, KEYBOARD_KEYS, key, true);
  }

  releaseKey(key: InputId): this {
    return this.toggle(this._keys, KEYBOARD_KEYS, key, false);
  }

  // ── Mouse ─────────────────────────────────────────────────────────────

  pressMouseButton(button: InputId): this {
    return this.toggle(this._mouseButtons, MOUSE_BUTTONS, button, true);
  }

  releaseMouseButton(button: InputId): this {
    return this.toggle(this._mouseButtons, MOUSE_BUTTONS, button, false);
  }

  moveMouse(x: number, y: number): this {
    this._mousePosition = { x, y };
    return this;
  }

  // ── Joystick ──────────────────────────────────────────────────────────

  /** Connects a joystick; connection order decides which one is polled. */
  connectJoystick(id: number): this {
    if (!this._joysticks.has(id)) {
      this._joysticks.set(id, {
        buttons: new Array<boolean>(JOYSTICK_BUTTONS.size).fill(false),
        axes:    new Array<number>(JOYSTICK_AXES.size).fill(0),
      });
    }
    return this;
  }

  disconnectJoystick(id: number): this {
    this._joysticks.delete(id);
    return this;
  }

  setJoystickButton(id: number, button: InputId, pressed: boolean): this {
    const joystick = this._joysticks.get(id);
    const index = JOYSTICK_BUTTONS.indexOf(button);
    if (!joystick || index === null) {
      log.warn({ joystickId: id, button }, "Ignoring button for unknown joystick or button");
      return this;
    }
    joystick.buttons[index] = pressed;
    return this;
  }

  setJoystickAxis(id: number, axis: InputId, value: number): this {
    const joystick = this._joysticks.get(id);
    const index = JOYSTICK_AXES.indexOf(axis);
    if (!joystick || index === null) {
      log.warn({ joystickId: id, axis }, "Ignoring axis for unknown joystick or axis");
      return this;
    }
    joystick.axes[index] = value;
    return this;
  }

  /** Releases everything and disconnects all joysticks. */
  clear(): this {
    this._keys.clear();
    this._mouseButtons.clear();
    this._mousePosition = { x: 0, y: 0 };
    this._joysticks.clear();
    return this;
  }

  // ── RawInputSource ────────────────────────────────────────────────────

  pollKeyState(key: number): boolean {
    return this._keys.has(key);
  }

  pollMouseState(): RawMouseState {
    const buttons = new Array<boolean>(MOUSE_BUTTONS.size);
    for (let i = 0; i < buttons.length; i++) buttons[i] = this._mouseButtons.has(i);
    return { position: { ...this._mousePosition }, buttons };
  }

  connectedJoysticks(): ReadonlyArray<number> {
    return [...this._joysticks.keys()];
  }

  pollJoystickState(id: number): RawJoystickState | null {
    const joystick = this._joysticks.get(id);
    if (!joystick) return null;
    return { buttons: [...joystick.buttons], axes: [...joystick.axes] };
  }

  private toggle(set: Set<number>, table: NameTable, id: InputId, pressed: boolean): this {
    const index = table.indexOf(id);
    if (index === null) {
      log.warn({ id }, `Ignoring unknown ${table.label}`);
      return this;
    }
    if (pressed) set.add(index);
    else set.delete(index);
    return this;
  }
}
