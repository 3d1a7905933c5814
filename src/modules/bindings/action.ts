/**
 * action.ts — A named, ordered list of bindings
 *
 * Binding order is priority order. `value` and `isPressed` stop at the first
 * binding that gives a decisive answer; `justPressed` and `justReleased` are
 * an OR across every binding, so a one-frame edge on a lower-priority binding
 * is never masked.
 *
 * Example:
 *   const horizontal = new Action(
 *     "horizontal",
 *     new InputMap("Joystick", "Axis",   "LeftStickX"),
 *     new InputMap("Keyboard", "Button", "D", "A"),
 *   );
 *   horizontal.value(input); // stick reading if non-zero, else ±1 from D/A
 */

import { logger } from "../../logger.js";
import { AXIS_PRESS_THRESHOLD, type DeviceQueries, type ParseResult } from "../devices/types.js";
import { InputMap } from "./input-map.js";
import { asValidName, isValidName } from "./naming.js";
import type { XmlElement } from "./xml.js";

const log = logger.child({ module: "action" });

export class Action implements Iterable<InputMap> {
  private _name = "";
  private readonly _maps: InputMap[] = [];

  constructor(name = "", ...maps: InputMap[]) {
    this.name = name;
    this.addAll(...maps);
  }

  /** Setting the name normalizes it, e.g. "move left" → "move_left". */
  get name(): string {
    return this._name;
  }

  set name(value: string) {
    this._name = asValidName(value);
  }

  get count(): number {
    return this._maps.length;
  }

  get empty(): boolean {
    return this._maps.length === 0;
  }

  get(index: number): InputMap | undefined {
    return this._maps[index];
  }

  contains(map: InputMap): boolean {
    return this._maps.some((m) => m.equals(map));
  }

  /**
   * Appends a copy of the binding. Fails when the binding is invalid or
   * collides with a binding already in the action.
   */
  add(map: InputMap): boolean {
    const reason = map.validate();
    if (reason) {
      log.warn({ action: this._name, reason }, "Rejected invalid binding");
      return false;
    }
    if (this._maps.some((m) => InputMap.collides(map, m))) {
      log.warn({ action: this._name, binding: map.toXml().attributes }, "Rejected colliding binding");
      return false;
    }
    this._maps.push(map.clone());
    return true;
  }

  /** Adds each binding in turn; returns how many were accepted. */
  addAll(...maps: InputMap[]): number {
    let added = 0;
    for (const map of maps) if (this.add(map)) added++;
    return added;
  }

  /**
   * Replaces the binding at `index` with a copy of `map`, checking collisions
   * against every other binding.
   */
  set(index: number, map: InputMap): boolean {
    if (!Number.isInteger(index) || index < 0 || index >= this._maps.length) {
      log.warn({ action: this._name, index }, "Binding index out of range");
      return false;
    }
    const reason = map.validate();
    if (reason) {
      log.warn({ action: this._name, reason }, "Rejected invalid binding");
      return false;
    }
    if (this._maps.some((m, i) => i !== index && InputMap.collides(map, m))) {
      log.warn({ action: this._name, index }, "Rejected colliding binding");
      return false;
    }
    this._maps[index] = map.clone();
    return true;
  }

  remove(target: number | InputMap): boolean {
    const index = typeof target === "number" ? target : this._maps.findIndex((m) => m.equals(target));
    if (!Number.isInteger(index) || index < 0 || index >= this._maps.length) return false;
    this._maps.splice(index, 1);
    return true;
  }

  clear(): void {
    this._maps.length = 0;
  }

  /** Valid name, every binding valid, and no colliding pair. */
  get isValid(): boolean {
    if (!isValidName(this._name)) return false;
    for (let i = 0; i < this._maps.length; i++) {
      const a = this._maps[i];
      if (!a.isValid) return false;
      for (let j = i + 1; j < this._maps.length; j++) {
        if (InputMap.collides(a, this._maps[j])) return false;
      }
    }
    return true;
  }

  clone(): Action {
    const copy = new Action(this._name);
    for (const map of this._maps) copy._maps.push(map.clone());
    return copy;
  }

  [Symbol.iterator](): Iterator<InputMap> {
    return this._maps[Symbol.iterator]();
  }

  // ── Evaluation ────────────────────────────────────────────────────────

  /**
   * Scalar value of the action. Axis bindings give their raw reading, button
   * bindings give +1 / -1; `invert` negates either. The first binding with a
   * non-neutral result wins; 0 when none has one.
   */
  value(input: DeviceQueries): number {
    for (const map of this._maps) {
      if (!map.isValid) continue;

      if (map.type === "Axis") {
        const v = input.getAxis(map.device, map.positive);
        if (v !== 0) return map.invert ? -v : v;
        continue;
      }

      const pos = input.isPressed(map.device, map.positive);
      const neg = input.isPressed(map.device, map.negative);
      if (pos === neg) continue;

      const sign = pos ? 1 : -1;
      return map.invert ? -sign : sign;
    }
    return 0;
  }

  isPositive(input: DeviceQueries): boolean {
    return this.value(input) >= AXIS_PRESS_THRESHOLD;
  }

  isNegative(input: DeviceQueries): boolean {
    return this.value(input) <= -AXIS_PRESS_THRESHOLD;
  }

  /**
   * True when the first binding with exactly one active side has its positive
   * side active. Axes count as active past AXIS_PRESS_THRESHOLD.
   */
  isPressed(input: DeviceQueries): boolean {
    for (const map of this._maps) {
      let pos: boolean;
      let neg: boolean;

      if (map.type === "Axis") {
        const axis = input.getAxis(map.device, map.positive);
        pos = axis >= AXIS_PRESS_THRESHOLD;
        neg = axis <= -AXIS_PRESS_THRESHOLD;
      } else {
        pos = input.isPressed(map.device, map.positive);
        neg = input.isPressed(map.device, map.negative);
      }

      if (pos !== neg) return pos;
    }
    return false;
  }

  /** True when any binding's positive side was pressed this frame and its negative side was not. */
  justPressed(input: DeviceQueries): boolean {
    return this._maps.some((map) => {
      if (map.type === "Axis") {
        const now  = input.getAxis(map.device, map.positive);
        const then = input.getLastAxis(map.device, map.positive);
        const rising  = now >= AXIS_PRESS_THRESHOLD && then < AXIS_PRESS_THRESHOLD;
        const falling = now <= -AXIS_PRESS_THRESHOLD && then > -AXIS_PRESS_THRESHOLD;
        return rising && !falling;
      }
      return input.justPressed(map.device, map.positive) && !input.justPressed(map.device, map.negative);
    });
  }

  /** True when any binding's positive side was released this frame and its negative side was not. */
  justReleased(input: DeviceQueries): boolean {
    return this._maps.some((map) => {
      if (map.type === "Axis") {
        const now  = input.getAxis(map.device, map.positive);
        const then = input.getLastAxis(map.device, map.positive);
        const rising  = then >= AXIS_PRESS_THRESHOLD && now < AXIS_PRESS_THRESHOLD;
        const falling = then <= -AXIS_PRESS_THRESHOLD && now > -AXIS_PRESS_THRESHOLD;
        return rising && !falling;
      }
      return input.justReleased(map.device, map.positive) && !input.justReleased(map.device, map.negative);
    });
  }

  // ── XML ───────────────────────────────────────────────────────────────

  toXml(): XmlElement {
    return {
      name:       "action",
      attributes: { name: this._name },
      children:   this._maps.map((m) => m.toXml()),
    };
  }

  /**
   * Builds an action from an <action> element. Child elements other than
   * <axis> and <button> are ignored; any binding that fails to load, or
   * that collides with an earlier one, fails the whole action.
   */
  static fromXml(element: XmlElement): ParseResult<Action> {
    const name = element.attributes.name;
    if (name === undefined) return { ok: false, error: "<action> has no name attribute" };
    if (!isValidName(name.trim())) return { ok: false, error: `<action> has invalid name "${name}"` };

    const action = new Action(name);
    for (const child of element.children) {
      if (child.name !== "axis" && child.name !== "button") continue;

      const map = InputMap.fromXml(child);
      if (!map.ok) return { ok: false, error: `action "${action.name}": ${map.error}` };

      if (action._maps.some((m) => InputMap.collides(map.value, m))) {
        return { ok: false, error: `action "${action.name}": binding collides with an earlier binding` };
      }
      action._maps.push(map.value);
    }
    return { ok: true, value: action };
  }
}
