/**
 * Shared types for the devices module.
 * Imported by the name tables, managers and the virtual source — never from
 * index.ts — so there are no circular dependencies between the sub-modules.
 */

export type InputDevice = "Keyboard" | "Mouse" | "Joystick";

export type InputType = "Button" | "Axis";

/** Devices in the order the facade updates and inspects them. */
export const INPUT_DEVICES: ReadonlyArray<InputDevice> = ["Keyboard", "Mouse", "Joystick"];

export const INPUT_TYPES: ReadonlyArray<InputType> = ["Button", "Axis"];

/** Axis magnitude at or above which an axis counts as a pressed button. */
export const AXIS_PRESS_THRESHOLD = 0.4;

/** A button or axis identifier: a table index, a symbolic name, or a decimal index string. */
export type InputId = number | string;

export interface Vec2 {
  x: number;
  y: number;
}

export type ParseResult<T> =
  | { ok: true;  value: T }
  | { ok: false; error: string };

// ---------------------------------------------------------------------------
// Raw device capability
// ---------------------------------------------------------------------------

export interface RawMouseState {
  /** Desktop cursor position in pixels. */
  position: Readonly<Vec2>;
  buttons:  ReadonlyArray<boolean>;
}

export interface RawJoystickState {
  buttons: ReadonlyArray<boolean>;
  axes:    ReadonlyArray<number>;
}

/**
 * Hardware polling boundary. Implementations wrap whatever window or driver
 * layer the host application runs on; every call is synchronous.
 */
export interface RawInputSource {
  pollKeyState(key: number): boolean;
  pollMouseState(): RawMouseState;
  /** Ids of the joysticks currently connected, in connection order. */
  connectedJoysticks(): ReadonlyArray<number>;
  /** Returns null when the joystick is no longer connected. */
  pollJoystickState(id: number): RawJoystickState | null;
}

// ---------------------------------------------------------------------------
// Query surface used by actions
// ---------------------------------------------------------------------------

/**
 * Device-addressed queries an Action evaluates its bindings against.
 * Implemented by the Input facade.
 */
export interface DeviceQueries {
  isPressed(device: InputDevice, id: InputId): boolean;
  justPressed(device: InputDevice, id: InputId): boolean;
  justReleased(device: InputDevice, id: InputId): boolean;
  getAxis(device: InputDevice, id: InputId): number;
  getLastAxis(device: InputDevice, id: InputId): number;
}

/**
 * Resolves a device name case-insensitively ("joystick" → "Joystick").
 */
export function parseInputDevice(name: string): InputDevice | null {
  const lower = name.trim().toLowerCase();
  return INPUT_DEVICES.find((d) => d.toLowerCase() === lower) ?? null;
}

export function parseInputType(name: string): InputType | null {
  const lower = name.trim().toLowerCase();
  return INPUT_TYPES.find((t) => t.toLowerCase() === lower) ?? null;
}
