/**
 * input.ts — Composition root for devices and actions
 *
 * One Input owns a keyboard, mouse and joystick manager plus an ActionSet.
 * The frame loop calls `update()` exactly once per frame before querying:
 *
 *   const input = new Input(source);
 *   input.loadFromFile();
 *   // each frame:
 *   input.update();
 *   if (input.actionJustPressed("jump")) { ... }
 *   const dx = input.getValue("horizontal");
 *
 * Code that prefers a process-wide instance uses getInput(), which builds
 * one lazily on first access.
 */

import { ActionSet } from "../bindings/action-set.js";
import { JoystickManager } from "../devices/joystick-manager.js";
import { KeyboardManager } from "../devices/keyboard-manager.js";
import { MouseManager } from "../devices/mouse-manager.js";
import { isAxis, isButton } from "../devices/names.js";
import type { DeviceManager } from "../devices/device-manager.js";
import { INPUT_DEVICES, type DeviceQueries, type InputDevice, type InputId, type RawInputSource } from "../devices/types.js";
import { VirtualInputSource } from "../devices/virtual-source.js";
import { InputSettingsSchema, type InputSettings } from "../settings/index.js";

export class Input implements DeviceQueries {
  static readonly isButton = isButton;
  static readonly isAxis   = isAxis;

  readonly keyboard: KeyboardManager;
  readonly mouse:    MouseManager;
  readonly joystick: JoystickManager;
  readonly actions:  ActionSet;
  readonly settings: InputSettings;

  private _lastDevice: InputDevice | null = null;

  constructor(source: RawInputSource, settings: Partial<InputSettings> = {}) {
    this.keyboard = new KeyboardManager(source);
    this.mouse    = new MouseManager(source);
    this.joystick = new JoystickManager(source);
    this.actions  = new ActionSet();
    this.settings = InputSettingsSchema.parse(settings);
  }

  /** Device that produced the most recent input, or null before any input. */
  get lastDevice(): InputDevice | null {
    return this._lastDevice;
  }

  /**
   * Advances keyboard, mouse and joystick by one frame, in that order, then
   * attributes the frame to the first of them that saw activity.
   */
  update(): void {
    const managers = INPUT_DEVICES.map((device) => this.manager(device));
    for (const manager of managers) manager.update();

    const active = managers.find((m) => m.hasActivity());
    if (active) this._lastDevice = active.device;
  }

  manager(device: InputDevice): DeviceManager {
    switch (device) {
      case "Keyboard": return this.keyboard;
      case "Mouse":    return this.mouse;
      case "Joystick": return this.joystick;
    }
  }

  // ── Device queries ────────────────────────────────────────────────────

  isPressed(device: InputDevice, id: InputId): boolean {
    return this.manager(device).isPressed(id);
  }

  justPressed(device: InputDevice, id: InputId): boolean {
    return this.manager(device).justPressed(id);
  }

  justReleased(device: InputDevice, id: InputId): boolean {
    return this.manager(device).justReleased(id);
  }

  getAxis(device: InputDevice, id: InputId): number {
    return this.manager(device).getAxis(id);
  }

  getLastAxis(device: InputDevice, id: InputId): number {
    return this.manager(device).getLastAxis(id);
  }

  axisDelta(device: InputDevice, id: InputId): number {
    return this.manager(device).axisDelta(id);
  }

  axisIsPressed(device: InputDevice, id: InputId, bidirectional = false): boolean {
    return this.manager(device).axisIsPressed(id, bidirectional);
  }

  axisJustPressed(device: InputDevice, id: InputId, bidirectional = false): boolean {
    return this.manager(device).axisJustPressed(id, bidirectional);
  }

  axisJustReleased(device: InputDevice, id: InputId, bidirectional = false): boolean {
    return this.manager(device).axisJustReleased(id, bidirectional);
  }

  // ── Action queries ────────────────────────────────────────────────────

  isActionPressed(action: string): boolean {
    return this.actions.get(action)?.isPressed(this) ?? false;
  }

  actionJustPressed(action: string): boolean {
    return this.actions.get(action)?.justPressed(this) ?? false;
  }

  actionJustReleased(action: string): boolean {
    return this.actions.get(action)?.justReleased(this) ?? false;
  }

  getValue(action: string): number {
    return this.actions.get(action)?.value(this) ?? 0;
  }

  // ── Persistence ───────────────────────────────────────────────────────

  /** Replaces the action set from a bindings file; keeps the old set on failure. */
  loadFromFile(path: string = this.settings.bindingsPath): boolean {
    return this.actions.loadFromFile(path);
  }

  saveToFile(path: string = this.settings.bindingsPath, overwrite: boolean = this.settings.overwriteOnSave): boolean {
    return this.actions.saveToFile(path, overwrite);
  }
}

// ---------------------------------------------------------------------------
// Shared instance
// ---------------------------------------------------------------------------

type InstanceState = "uninitialized" | "constructing" | "ready";

let _state: InstanceState = "uninitialized";
let _instance: Input | null = null;

/**
 * Returns the process-wide Input, constructing it on first call.
 * `source` and `settings` only apply to that first call; without a source
 * the instance polls a VirtualInputSource.
 *
 * Calling getInput() while the instance is being constructed (from inside a
 * source or settings hook) is a programmer error and throws.
 */
export function getInput(source?: RawInputSource, settings?: Partial<InputSettings>): Input {
  if (_state === "ready" && _instance) return _instance;
  if (_state === "constructing") {
    throw new Error("getInput() called while the shared Input is being constructed");
  }

  _state = "constructing";
  try {
    _instance = new Input(source ?? new VirtualInputSource(), settings);
    _state = "ready";
  } catch (err) {
    _state = "uninitialized";
    throw err;
  }
  return _instance;
}

/** Drops the shared instance so the next getInput() builds a fresh one. */
export function resetInput(): void {
  _instance = null;
  _state = "uninitialized";
}
