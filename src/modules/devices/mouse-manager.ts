import { DeviceManager } from "./device-manager.js";
import { MOUSE_AXES, MOUSE_BUTTONS } from "./names.js";
import { createMouseSnapshot, type MouseSnapshot } from "./snapshot.js";
import type { RawInputSource, Vec2 } from "./types.js";

/**
 * Mouse state. The two axes are the desktop cursor position, so
 * `axisDelta("XPosition")` is the horizontal movement since last frame.
 */
export class MouseManager extends DeviceManager<MouseSnapshot> {
  constructor(source: RawInputSource) {
    super("Mouse", MOUSE_BUTTONS, MOUSE_AXES, source);
  }

  get position(): Readonly<Vec2> {
    return this.current.position;
  }

  get lastPosition(): Readonly<Vec2> {
    return this.previous.position;
  }

  protected poll(): MouseSnapshot {
    const raw = this.source.pollMouseState();
    return createMouseSnapshot(raw.position, raw.buttons, this.buttonNames.size);
  }

  protected blank(): MouseSnapshot {
    return createMouseSnapshot({ x: 0, y: 0 }, [], this.buttonNames.size);
  }

  /** Button edges or any cursor movement. */
  override hasActivity(): boolean {
    const now  = this.current.position;
    const then = this.previous.position;
    return this.anyButtonEdge() || now.x !== then.x || now.y !== then.y;
  }
}
