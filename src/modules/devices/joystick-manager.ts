/**
 * joystick-manager.ts — First-connected joystick, XInput layout
 *
 * Only one joystick is polled: the one that was first in the source's
 * connection list when the previous joystick went away. If it disconnects,
 * the next update() switches to whichever joystick is now first; with none
 * connected the snapshot is all released / all zero.
 *
 * Derived values:
 *   • "Triggers" axis = RightTrigger - LeftTrigger
 *   • "LT" / "RT" buttons read pressed when the raw button is down or the
 *     matching trigger axis is at or past AXIS_PRESS_THRESHOLD
 */

import { logger } from "../../logger.js";
import { DeviceManager } from "./device-manager.js";
import { JOYSTICK_AXES, JOYSTICK_BUTTONS, JoystickAxis, JoystickButton } from "./names.js";
import { createSnapshot, type DeviceSnapshot } from "./snapshot.js";
import { AXIS_PRESS_THRESHOLD, type RawInputSource } from "./types.js";

const log = logger.child({ module: "joystick" });

export class JoystickManager extends DeviceManager {
  private _activeId: number | null = null;

  constructor(source: RawInputSource) {
    super("Joystick", JOYSTICK_BUTTONS, JOYSTICK_AXES, source);
  }

  /** Id of the joystick being polled, or null when none is connected. */
  get activeId(): number | null {
    return this._activeId;
  }

  get isConnected(): boolean {
    return this._activeId !== null;
  }

  protected poll(): DeviceSnapshot {
    const id = this.selectJoystick();
    if (id === null) return this.emptyState();

    const raw = this.source.pollJoystickState(id);
    if (!raw) {
      log.info({ joystickId: id }, "Joystick stopped reporting — treating as disconnected");
      this._activeId = null;
      return this.emptyState();
    }

    const axes = new Array<number>(this.axisNames.size);
    for (let i = 0; i < axes.length; i++) axes[i] = raw.axes[i] ?? 0;
    axes[JoystickAxis.Triggers] = axes[JoystickAxis.RightTrigger] - axes[JoystickAxis.LeftTrigger];

    const buttons = new Array<boolean>(this.buttonNames.size);
    for (let i = 0; i < buttons.length; i++) buttons[i] = raw.buttons[i] === true;
    buttons[JoystickButton.LT] ||= axes[JoystickAxis.LeftTrigger]  >= AXIS_PRESS_THRESHOLD;
    buttons[JoystickButton.RT] ||= axes[JoystickAxis.RightTrigger] >= AXIS_PRESS_THRESHOLD;

    return createSnapshot(buttons, axes, this.buttonNames.size, this.axisNames.size);
  }

  protected blank(): DeviceSnapshot {
    return this.emptyState();
  }

  /** Keeps the active joystick while it stays connected, else takes the first one. */
  private selectJoystick(): number | null {
    const connected = this.source.connectedJoysticks();
    if (this._activeId !== null && connected.includes(this._activeId)) return this._activeId;

    const previous = this._activeId;
    const next = connected[0] ?? null;
    this._activeId = next;

    if (previous !== null && next !== null) {
      log.info({ from: previous, to: next }, "Active joystick disconnected — switched to next connected joystick");
    } else if (previous !== null) {
      log.info({ joystickId: previous }, "Joystick disconnected");
    } else if (next !== null) {
      log.info({ joystickId: next }, "Joystick connected");
    }
    return next;
  }
}
