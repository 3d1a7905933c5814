// Re-export all types
export type {
  InputDevice,
  InputType,
  InputId,
  Vec2,
  ParseResult,
  RawInputSource,
  RawMouseState,
  RawJoystickState,
  DeviceQueries,
} from "./types.js";
export {
  INPUT_DEVICES,
  INPUT_TYPES,
  AXIS_PRESS_THRESHOLD,
  parseInputDevice,
  parseInputType,
} from "./types.js";

// Re-export identifier tables
export { NameTable } from "./name-table.js";
export {
  KEYBOARD_KEYS,
  KEYBOARD_AXES,
  MOUSE_BUTTONS,
  MOUSE_AXES,
  JOYSTICK_BUTTONS,
  JOYSTICK_AXES,
  MouseButton,
  MouseAxis,
  JoystickButton,
  JoystickAxis,
  buttonTable,
  axisTable,
  identifierTable,
  isButton,
  isAxis,
} from "./names.js";

// Re-export snapshots and managers
export type { DeviceSnapshot, MouseSnapshot } from "./snapshot.js";
export { DeviceManager } from "./device-manager.js";
export { KeyboardManager } from "./keyboard-manager.js";
export { MouseManager } from "./mouse-manager.js";
export { JoystickManager } from "./joystick-manager.js";
export { VirtualInputSource } from "./virtual-source.js";
