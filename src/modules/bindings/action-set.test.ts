/**
 * action-set.test.ts — Collection semantics and bindings files
 *
 * File tests write into a fresh temp directory per test.
 */

import { afterEach, beforeEach, describe, it } from "node:test";
import assert from "node:assert/strict";
import { existsSync, readFileSync, rmSync, writeFileSync } from "fs";
import { join } from "path";
import { Action } from "./action.js";
import { ActionSet } from "./action-set.js";
import { InputMap } from "./input-map.js";
import { HORIZONTAL_DOCUMENT, makeTempDir } from "../../tests/helpers/index.js";

function jump(key = "Space"): Action {
  return new Action("jump", new InputMap("Keyboard", "Button", key));
}

// ── Collection ──────────────────────────────────────────────────────────────

describe("ActionSet — collection", () => {
  it("looks actions up ignoring case", () => {
    const set = new ActionSet(jump());
    assert.equal(set.contains("JUMP"), true);
    assert.equal(set.get("Jump")?.name, "jump");
    assert.equal(set.get("run"), undefined);
  });

  it("add without replace keeps the existing action", () => {
    const set = new ActionSet(jump("Space"));
    assert.equal(set.add(jump("Enter")), false);
    assert.equal(set.get("jump")?.get(0)?.positive, "Space");
  });

  it("add with replace swaps the action", () => {
    const set = new ActionSet(jump("Space"));
    assert.equal(set.add(jump("Enter"), true), true);
    assert.equal(set.count, 1);
    assert.equal(set.get("jump")?.get(0)?.positive, "Enter");
  });

  it("stores a copy, so renaming the caller's action leaves the key intact", () => {
    const action = jump();
    const set = new ActionSet(action);
    action.name = "fire";

    assert.deepEqual(set.names(), ["jump"]);
    assert.equal(set.get("jump")?.name, "jump");
    assert.equal(set.get("fire"), undefined);
  });

  it("rejects an invalid action", () => {
    const set = new ActionSet();
    assert.equal(set.add(new Action("", new InputMap("Keyboard", "Button", "Space"))), false);
    assert.equal(set.empty, true);
  });

  it("lists names in insertion order", () => {
    const set = new ActionSet(new Action("b"), new Action("a"), new Action("c"));
    assert.deepEqual(set.names(), ["b", "a", "c"]);
    assert.deepEqual([...set].map((a) => a.name), ["b", "a", "c"]);
  });

  it("remove accepts a name or an action", () => {
    const set = new ActionSet(jump(), new Action("pause"));
    assert.equal(set.remove("PAUSE"), true);
    assert.equal(set.remove(jump()), true);
    assert.equal(set.remove("jump"), false);
    assert.equal(set.empty, true);
  });

  it("clear empties the set", () => {
    const set = new ActionSet(jump());
    set.clear();
    assert.equal(set.count, 0);
  });
});

// ── Documents ───────────────────────────────────────────────────────────────

describe("ActionSet — documents", () => {
  it("loads the bindings of each action in order", () => {
    const set = new ActionSet();
    assert.equal(set.loadFromString(HORIZONTAL_DOCUMENT), true);
    const horizontal = set.get("horizontal");
    assert.ok(horizontal);
    assert.equal(horizontal.count, 2);
    assert.equal(horizontal.get(0)?.equals(new InputMap("Joystick", "Axis", "LeftStickX")), true);
    assert.equal(horizontal.get(1)?.equals(new InputMap("Keyboard", "Button", "D", "A")), true);
  });

  it("replaces the previous contents on a successful load", () => {
    const set = new ActionSet(jump());
    assert.equal(set.loadFromString(HORIZONTAL_DOCUMENT), true);
    assert.deepEqual(set.names(), ["horizontal"]);
  });

  it("accepts <action_set> as the root element", () => {
    const set = new ActionSet();
    const ok = set.loadFromString(`<action_set><action name="jump"><button device="Keyboard" positive="Space"/></action></action_set>`);
    assert.equal(ok, true);
    assert.equal(set.contains("jump"), true);
  });

  it("a failed load leaves the set untouched", () => {
    const set = new ActionSet(jump());
    const broken = HORIZONTAL_DOCUMENT.replace(`negative="A"`, `negative="NotAKey"`);
    assert.equal(set.loadFromString(broken), false);
    assert.deepEqual(set.names(), ["jump"]);
  });

  it("rejects malformed markup", () => {
    const set = new ActionSet(jump());
    assert.equal(set.loadFromString(`<input><action_set></input>`), false);
    assert.equal(set.count, 1);
  });

  it("rejects an unexpected root element", () => {
    const result = ActionSet.fromXml({ name: "bindings", attributes: {}, children: [] });
    assert.deepEqual(result, {
      ok: false,
      error: "root element must be <input> or <action_set>, found <bindings>",
    });
  });

  it("rejects <input> without an <action_set>", () => {
    const result = ActionSet.fromXml({ name: "input", attributes: {}, children: [] });
    assert.deepEqual(result, { ok: false, error: "<input> has no <action_set> element" });
  });

  it("the later of two same-named actions wins", () => {
    const set = new ActionSet();
    const ok = set.loadFromString(`<input><action_set>
      <action name="jump"><button device="Keyboard" positive="Space"/></action>
      <action name="JUMP"><button device="Keyboard" positive="Enter"/></action>
    </action_set></input>`);
    assert.equal(ok, true);
    assert.equal(set.count, 1);
    assert.equal(set.get("jump")?.get(0)?.positive, "Enter");
  });

  it("toString reads back as an equal set", () => {
    const set = new ActionSet();
    set.loadFromString(HORIZONTAL_DOCUMENT);
    set.add(new Action("fire", new InputMap("Mouse", "Button", "Left", "", true)));

    const copy = new ActionSet();
    assert.equal(copy.loadFromString(set.toString()), true);
    assert.deepEqual(copy.names(), ["horizontal", "fire"]);
    for (const action of set) {
      const loaded = copy.get(action.name);
      assert.ok(loaded);
      assert.deepEqual([...loaded].map((m) => m.toXml()), [...action].map((m) => m.toXml()));
    }
  });

  it("toString writes the action element", () => {
    assert.ok(new ActionSet(jump()).toString().includes(`<action name="jump">`));
  });
});

// ── Files ───────────────────────────────────────────────────────────────────

describe("ActionSet — files", () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("saves and loads a file", () => {
    const path = join(dir, "input.xml");
    assert.equal(new ActionSet(jump()).saveToFile(path), true);

    const set = new ActionSet();
    assert.equal(set.loadFromFile(path), true);
    assert.equal(set.get("jump")?.get(0)?.positive, "Space");
  });

  it("does not overwrite an existing file when overwrite is false", () => {
    const path = join(dir, "input.xml");
    writeFileSync(path, "keep me", "utf-8");
    assert.equal(new ActionSet(jump()).saveToFile(path, false), false);
    assert.equal(readFileSync(path, "utf-8"), "keep me");
  });

  it("overwrites by default", () => {
    const path = join(dir, "input.xml");
    writeFileSync(path, "old", "utf-8");
    assert.equal(new ActionSet(jump()).saveToFile(path), true);
    assert.notEqual(readFileSync(path, "utf-8"), "old");
  });

  it("fails to save into a missing directory", () => {
    const path = join(dir, "missing", "input.xml");
    assert.equal(new ActionSet(jump()).saveToFile(path), false);
    assert.equal(existsSync(path), false);
  });

  it("fails to load a missing file and keeps its contents", () => {
    const set = new ActionSet(jump());
    assert.equal(set.loadFromFile(join(dir, "nope.xml")), false);
    assert.equal(set.count, 1);
  });
});
