/**
 * names.ts — Identifier tables for every device and input type
 *
 *   Keyboard buttons  — 101 keys, loaded from data/keyboard-keys.json
 *   Keyboard axes     — none
 *   Mouse buttons     — Left, Right, Middle, XButton1, XButton2
 *   Mouse axes        — XPosition, YPosition (desktop cursor position)
 *   Joystick buttons  — XInput layout (A, B, X, Y, Start, ..., DPadRight)
 *   Joystick axes     — sticks, triggers, and the combined "Triggers" axis
 *
 * The index of a name is its slot in the device snapshot arrays.
 */

import { readFileSync } from "fs";
import { z } from "zod";
import { NameTable } from "./name-table.js";
import type { InputDevice, InputId, InputType } from "./types.js";

// ---------------------------------------------------------------------------
// Keyboard
// ---------------------------------------------------------------------------

const KeyboardKeysFile = z.object({
  keys: z.array(z.string().min(1)).min(1),
});

function loadKeyboardKeys(): string[] {
  const url = new URL("./data/keyboard-keys.json", import.meta.url);
  return KeyboardKeysFile.parse(JSON.parse(readFileSync(url, "utf-8"))).keys;
}

export const KEYBOARD_KEYS = new NameTable("keyboard key", loadKeyboardKeys());

export const KEYBOARD_AXES = new NameTable("keyboard axis", []);

// ---------------------------------------------------------------------------
// Mouse
// ---------------------------------------------------------------------------

export const MouseButton = {
  Left:     0,
  Right:    1,
  Middle:   2,
  XButton1: 3,
  XButton2: 4,
} as const;

export type MouseButton = (typeof MouseButton)[keyof typeof MouseButton];

export const MouseAxis = {
  XPosition: 0,
  YPosition: 1,
} as const;

export type MouseAxis = (typeof MouseAxis)[keyof typeof MouseAxis];

export const MOUSE_BUTTONS = new NameTable("mouse button", Object.keys(MouseButton));

export const MOUSE_AXES = new NameTable("mouse axis", Object.keys(MouseAxis));

// ---------------------------------------------------------------------------
// Joystick
// ---------------------------------------------------------------------------

export const JoystickButton = {
  A:         0,
  B:         1,
  X:         2,
  Y:         3,
  Start:     4,
  Back:      5,
  Guide:     6,
  LB:        7,
  RB:        8,
  LT:        9,
  RT:        10,
  LS:        11,
  RS:        12,
  DPadUp:    13,
  DPadDown:  14,
  DPadLeft:  15,
  DPadRight: 16,
} as const;

export type JoystickButton = (typeof JoystickButton)[keyof typeof JoystickButton];

export const JoystickAxis = {
  LeftStickX:   0,
  LeftStickY:   1,
  RightStickX:  2,
  RightStickY:  3,
  LeftTrigger:  4,
  RightTrigger: 5,
  /** Derived: RightTrigger - LeftTrigger. */
  Triggers:     6,
} as const;

export type JoystickAxis = (typeof JoystickAxis)[keyof typeof JoystickAxis];

export const JOYSTICK_BUTTONS = new NameTable("joystick button", Object.keys(JoystickButton));

export const JOYSTICK_AXES = new NameTable("joystick axis", Object.keys(JoystickAxis));

// ---------------------------------------------------------------------------
// Lookup by device
// ---------------------------------------------------------------------------

export function buttonTable(device: InputDevice): NameTable {
  switch (device) {
    case "Keyboard": return KEYBOARD_KEYS;
    case "Mouse":    return MOUSE_BUTTONS;
    case "Joystick": return JOYSTICK_BUTTONS;
  }
}

export function axisTable(device: InputDevice): NameTable {
  switch (device) {
    case "Keyboard": return KEYBOARD_AXES;
    case "Mouse":    return MOUSE_AXES;
    case "Joystick": return JOYSTICK_AXES;
  }
}

export function identifierTable(device: InputDevice, type: InputType): NameTable {
  return type === "Button" ? buttonTable(device) : axisTable(device);
}

/** True when `id` names a button (or key) of `device`. */
export function isButton(device: InputDevice, id: InputId): boolean {
  return buttonTable(device).has(id);
}

/** True when `id` names an axis of `device`. The keyboard has none. */
export function isAxis(device: InputDevice, id: InputId): boolean {
  return axisTable(device).has(id);
}
