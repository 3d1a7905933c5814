/**
 * input-map.ts — One binding from a logical positive/negative pair to a
 * physical device identifier
 *
 * Button bindings may name a positive and/or a negative button:
 *
 *   new InputMap("Keyboard", "Button", "D", "A")     // D → +1, A → -1
 *   new InputMap("Mouse",    "Button", "Left")       // Left → +1
 *
 * Axis bindings are read through `positive`; a `negative` axis is kept and
 * checked but does not take part in evaluation:
 *
 *   new InputMap("Joystick", "Axis", "LeftStickX")
 *
 * XML form (identifiers are written in their canonical spelling):
 *   <button device="Keyboard" positive="D" negative="A" invert="false"/>
 *   <axis   device="Joystick" value="LeftStickX" invert="false"/>
 */

import { identifierTable } from "../devices/names.js";
import {
  parseInputDevice,
  parseInputType,
  type InputDevice,
  type InputType,
  type ParseResult,
} from "../devices/types.js";
import type { XmlElement } from "./xml.js";

export class InputMap {
  device:   InputDevice;
  type:     InputType;
  positive: string;
  negative: string;
  invert:   boolean;

  constructor(
    device: InputDevice = "Keyboard",
    type: InputType = "Button",
    positive = "",
    negative = "",
    invert = false
  ) {
    this.device   = device;
    this.type     = type;
    this.positive = positive.trim();
    this.negative = negative.trim();
    this.invert   = invert;
  }

  /**
   * Two bindings collide when both are valid, share device and type, and one
   * binding's positive identifier is the other's negative (case-insensitive).
   * An action never holds a colliding pair.
   */
  static collides(a: InputMap, b: InputMap): boolean {
    if (!a.isValid || !b.isValid) return false;
    if (a.device !== b.device || a.type !== b.type) return false;

    const posA = a.positive.toLowerCase();
    const negA = a.negative.toLowerCase();
    const posB = b.positive.toLowerCase();
    const negB = b.negative.toLowerCase();

    return (posA !== "" && posA === negB) || (posB !== "" && posB === negA);
  }

  /** Human-readable reason the binding is invalid, or null when valid. */
  validate(): string | null {
    const pos = this.positive.trim();
    const neg = this.negative.trim();

    if (this.device === "Keyboard" && this.type !== "Button") {
      return "keyboard bindings must be buttons";
    }
    if (pos === "" && neg === "") {
      return "binding needs a positive or negative identifier";
    }

    const table = identifierTable(this.device, this.type);
    for (const id of [pos, neg]) {
      if (id === "") continue;
      const parsed = table.parse(id);
      if (!parsed.ok) return parsed.error;
    }
    return null;
  }

  get isValid(): boolean {
    return this.validate() === null;
  }

  clone(): InputMap {
    return new InputMap(this.device, this.type, this.positive, this.negative, this.invert);
  }

  /** Same device, type and invert flag; identifiers compared case-insensitively. */
  equals(other: InputMap): boolean {
    return (
      this.device === other.device &&
      this.type === other.type &&
      this.invert === other.invert &&
      this.positive.toLowerCase() === other.positive.toLowerCase() &&
      this.negative.toLowerCase() === other.negative.toLowerCase()
    );
  }

  /** `id` in the table's own spelling ("leftstickx" → "LeftStickX", "0" → "LeftStickX"). */
  private canonical(id: string): string {
    if (id === "") return id;
    const table = identifierTable(this.device, this.type);
    const parsed = table.parse(id);
    return parsed.ok ? (table.nameOf(parsed.value) ?? id) : id;
  }

  toXml(): XmlElement {
    const positive = this.canonical(this.positive);
    const negative = this.canonical(this.negative);

    const attributes: Record<string, string> = { device: this.device };
    if (this.type === "Axis") {
      attributes.value = positive;
      if (negative !== "") attributes.negative = negative;
    } else {
      attributes.positive = positive;
      attributes.negative = negative;
    }
    attributes.invert = String(this.invert);

    return { name: this.type === "Axis" ? "axis" : "button", attributes, children: [] };
  }

  /**
   * Builds a binding from an <axis> or <button> element.
   * Every failure names the offending attribute.
   */
  static fromXml(element: XmlElement): ParseResult<InputMap> {
    const type = parseInputType(element.name);
    if (!type) return { ok: false, error: `<${element.name}> is not a binding element` };

    const deviceAttr = element.attributes.device;
    if (deviceAttr === undefined) return { ok: false, error: `<${element.name}> has no device attribute` };

    const device = parseInputDevice(deviceAttr);
    if (!device) return { ok: false, error: `<${element.name}> has unknown device "${deviceAttr}"` };

    // `value` and `positive` name the same side; `value` is read first
    const positive = element.attributes.value ?? element.attributes.positive ?? "";
    const negative = element.attributes.negative ?? "";
    if (positive.trim() === "" && negative.trim() === "") {
      return { ok: false, error: `<${element.name}> needs a value, positive or negative attribute` };
    }

    let invert = false;
    const invertAttr = element.attributes.invert;
    if (invertAttr !== undefined) {
      const lower = invertAttr.trim().toLowerCase();
      if (lower !== "true" && lower !== "false") {
        return { ok: false, error: `<${element.name}> has invalid invert attribute "${invertAttr}"` };
      }
      invert = lower === "true";
    }

    const map = new InputMap(device, type, positive, negative, invert);
    const reason = map.validate();
    if (reason) return { ok: false, error: `Invalid ${device} ${element.name}: ${reason}` };
    return { ok: true, value: map };
  }
}
