/**
 * action-set.ts — Case-insensitive collection of actions and its file format
 *
 * Document layout:
 *
 *   <input>
 *     <action_set>
 *       <action name="horizontal">
 *         <axis device="Joystick" value="LeftStickX" invert="false"/>
 *         <button device="Keyboard" positive="D" negative="A" invert="false"/>
 *       </action>
 *     </action_set>
 *   </input>
 *
 * Loading is all-or-nothing: a replacement set is built off to the side and
 * only swapped in once every action in the document has loaded. A failed
 * load leaves the current actions untouched.
 */

import { existsSync, readFileSync, writeFileSync } from "fs";
import { logger } from "../../logger.js";
import type { ParseResult } from "../devices/types.js";
import { Action } from "./action.js";
import { buildXml, childElements, parseXml, type XmlElement } from "./xml.js";

const log = logger.child({ module: "action-set" });

export const ROOT_ELEMENT = "input";
export const ACTION_SET_ELEMENT = "action_set";

function keyOf(name: string): string {
  return name.toLowerCase();
}

export class ActionSet implements Iterable<Action> {
  private _actions = new Map<string, Action>();

  constructor(...actions: Action[]) {
    this.addAll(...actions);
  }

  get count(): number {
    return this._actions.size;
  }

  get empty(): boolean {
    return this._actions.size === 0;
  }

  /** Action names in insertion order. */
  names(): string[] {
    return [...this._actions.values()].map((a) => a.name);
  }

  contains(target: string | Action): boolean {
    const name = typeof target === "string" ? target : target.name;
    return this._actions.has(keyOf(name));
  }

  get(name: string): Action | undefined {
    return this._actions.get(keyOf(name));
  }

  /**
   * Adds a copy of a valid action. An existing action with the same name (ignoring
   * case) is replaced only when `replace` is set; otherwise the set is left
   * unchanged and false is returned.
   */
  add(action: Action, replace = false): boolean {
    if (!action.isValid) {
      log.warn({ action: action.name }, "Unable to add action to set: action is invalid");
      return false;
    }

    const key = keyOf(action.name);
    if (this._actions.has(key)) {
      if (!replace) {
        log.warn({ action: action.name }, "Unable to add action to set: an action with the same name exists and replace is false");
        return false;
      }
      this._actions.delete(key);
    }

    this._actions.set(key, action.clone());
    return true;
  }

  /** Adds each action without replacing; returns how many were accepted. */
  addAll(...actions: Action[]): number {
    let added = 0;
    for (const action of actions) if (this.add(action)) added++;
    return added;
  }

  remove(target: string | Action): boolean {
    const name = typeof target === "string" ? target : target.name;
    return this._actions.delete(keyOf(name));
  }

  clear(): void {
    this._actions.clear();
  }

  [Symbol.iterator](): Iterator<Action> {
    return this._actions.values();
  }

  // ── Serialization ─────────────────────────────────────────────────────

  toXml(): XmlElement {
    return {
      name:       ACTION_SET_ELEMENT,
      attributes: {},
      children:   [...this._actions.values()].map((a) => a.toXml()),
    };
  }

  /** The complete document, ready to be written to a bindings file. */
  toString(): string {
    return buildXml({ name: ROOT_ELEMENT, attributes: {}, children: [this.toXml()] });
  }

  /**
   * Replaces the contents with the actions described by `element`, which may
   * be the <input> root or an <action_set> element.
   */
  loadFromXml(element: XmlElement): boolean {
    const loaded = ActionSet.fromXml(element);
    if (!loaded.ok) {
      log.error({ reason: loaded.error }, "Unable to load action set");
      return false;
    }
    this._actions = loaded.value._actions;
    return true;
  }

  loadFromString(text: string): boolean {
    const root = parseXml(text);
    if (!root.ok) {
      log.error({ reason: root.error }, "Unable to load action set");
      return false;
    }
    return this.loadFromXml(root.value);
  }

  loadFromFile(path: string): boolean {
    let text: string;
    try {
      text = readFileSync(path, "utf-8");
    } catch (err) {
      log.error({ err, path }, "Unable to read action set file");
      return false;
    }

    const ok = this.loadFromString(text);
    if (ok) log.info({ path, actions: this.count }, "Loaded action set");
    return ok;
  }

  /**
   * Writes the document to `path`. With `overwrite` unset an existing file
   * is left alone and false is returned.
   */
  saveToFile(path: string, overwrite = true): boolean {
    if (!overwrite && existsSync(path)) {
      log.warn({ path }, "Not saving action set: file exists and overwrite is false");
      return false;
    }
    try {
      writeFileSync(path, this.toString(), "utf-8");
    } catch (err) {
      log.error({ err, path }, "Unable to write action set file");
      return false;
    }
    log.info({ path, actions: this.count }, "Saved action set");
    return true;
  }

  static fromXml(element: XmlElement): ParseResult<ActionSet> {
    let setElement: XmlElement | undefined = element;
    if (element.name === ROOT_ELEMENT) {
      setElement = childElements(element, ACTION_SET_ELEMENT)[0];
      if (!setElement) return { ok: false, error: `<${ROOT_ELEMENT}> has no <${ACTION_SET_ELEMENT}> element` };
    } else if (element.name !== ACTION_SET_ELEMENT) {
      return { ok: false, error: `root element must be <${ROOT_ELEMENT}> or <${ACTION_SET_ELEMENT}>, found <${element.name}>` };
    }

    const set = new ActionSet();
    for (const child of childElements(setElement, "action")) {
      const action = Action.fromXml(child);
      if (!action.ok) return action;

      if (set.contains(action.value)) {
        log.warn({ action: action.value.name }, "Duplicate action in document; the later definition wins");
      }
      if (!set.add(action.value, true)) {
        return { ok: false, error: `action "${action.value.name}" loaded but could not be added` };
      }
    }
    return { ok: true, value: set };
  }
}
