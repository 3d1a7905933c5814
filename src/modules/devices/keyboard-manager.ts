import { DeviceManager } from "./device-manager.js";
import { KEYBOARD_AXES, KEYBOARD_KEYS } from "./names.js";
import { createSnapshot, type DeviceSnapshot } from "./snapshot.js";
import type { RawInputSource } from "./types.js";

/**
 * Keyboard state. Keys are buttons only; every axis query returns 0.
 */
export class KeyboardManager extends DeviceManager {
  constructor(source: RawInputSource) {
    super("Keyboard", KEYBOARD_KEYS, KEYBOARD_AXES, source);
  }

  protected poll(): DeviceSnapshot {
    const keys = new Array<boolean>(this.buttonNames.size);
    for (let i = 0; i < keys.length; i++) keys[i] = this.source.pollKeyState(i);
    return createSnapshot(keys, [], this.buttonNames.size, 0);
  }

  protected blank(): DeviceSnapshot {
    return this.emptyState();
  }
}
