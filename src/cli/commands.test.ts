/**
 * commands.test.ts — In-process runs of the CLI commands
 */

import { afterEach, beforeEach, describe, it } from "node:test";
import assert from "node:assert/strict";
import { readFileSync, rmSync, writeFileSync } from "fs";
import { join } from "path";
import { runCli, starterActionSet, USAGE, type CliOutput } from "./commands.js";
import { ActionSet } from "../modules/bindings/action-set.js";
import { HORIZONTAL_DOCUMENT, makeTempDir } from "../tests/helpers/index.js";

interface Captured extends CliOutput {
  stdout: string[];
  stderr: string[];
}

function capture(): Captured {
  const stdout: string[] = [];
  const stderr: string[] = [];
  return {
    stdout,
    stderr,
    out: (line) => stdout.push(line),
    err: (line) => stderr.push(line),
  };
}

describe("runCli", () => {
  let dir: string;
  let io: Captured;

  beforeEach(() => {
    dir = makeTempDir();
    io = capture();
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  // ── help ──────────────────────────────────────────────────────────────────

  it("prints usage for help", () => {
    assert.equal(runCli(["--help"], io), 0);
    assert.deepEqual(io.stdout, [USAGE]);
  });

  it("fails on an unknown command", () => {
    assert.equal(runCli(["lint"], io), 1);
    assert.deepEqual(io.stderr, ["Unknown command: lint", USAGE]);
  });

  it("fails with no command", () => {
    assert.equal(runCli([], io), 1);
    assert.equal(io.stderr[0], "No command given");
  });

  // ── check ─────────────────────────────────────────────────────────────────

  it("check reports the actions in a valid file", () => {
    const path = join(dir, "input.xml");
    writeFileSync(path, HORIZONTAL_DOCUMENT, "utf-8");
    assert.equal(runCli(["check", path], io), 0);
    assert.deepEqual(io.stdout, [`${path}: 1 action(s) — horizontal`]);
  });

  it("check names the first problem in an invalid file", () => {
    const path = join(dir, "input.xml");
    writeFileSync(path, HORIZONTAL_DOCUMENT.replace(`device="Keyboard"`, `device="Pad"`), "utf-8");
    assert.equal(runCli(["check", path], io), 1);
    assert.deepEqual(io.stderr, [`${path}: action "horizontal": <button> has unknown device "Pad"`]);
  });

  it("check fails on a missing file", () => {
    const path = join(dir, "missing.xml");
    assert.equal(runCli(["check", path], io), 1);
    assert.ok(io.stderr[0].startsWith(`${path}: cannot read ${path}: `));
  });

  it("check without a path prints usage", () => {
    assert.equal(runCli(["check"], io), 1);
    assert.deepEqual(io.stderr, [USAGE]);
  });

  // ── format ────────────────────────────────────────────────────────────────

  it("format prints the canonical document", () => {
    const path = join(dir, "input.xml");
    writeFileSync(path, `<action_set><action name="jump"><button device="keyboard" value="Space"/></action></action_set>`, "utf-8");
    assert.equal(runCli(["format", path], io), 0);

    const expected = new ActionSet();
    assert.equal(expected.loadFromString(`<action_set><action name="jump"><button device="Keyboard" positive="Space"/></action></action_set>`), true);
    assert.deepEqual(io.stdout, [expected.toString().trimEnd()]);
  });

  it("format --write rewrites the file in place", () => {
    const path = join(dir, "input.xml");
    writeFileSync(path, HORIZONTAL_DOCUMENT.replace(/\n\s*/g, ""), "utf-8");
    assert.equal(runCli(["format", path, "--write"], io), 0);
    assert.deepEqual(io.stdout, [`${path}: formatted`]);

    const set = new ActionSet();
    set.loadFromString(HORIZONTAL_DOCUMENT);
    assert.equal(readFileSync(path, "utf-8"), set.toString());
  });

  // ── init ──────────────────────────────────────────────────────────────────

  it("init writes the starter bindings", () => {
    const path = join(dir, "input.xml");
    assert.equal(runCli(["init", path], io), 0);
    assert.deepEqual(io.stdout, [`${path}: created`]);

    const set = new ActionSet();
    assert.equal(set.loadFromFile(path), true);
    assert.deepEqual(set.names(), ["horizontal", "vertical", "jump", "pause"]);
  });

  it("init refuses to replace an existing file", () => {
    const path = join(dir, "input.xml");
    writeFileSync(path, "keep", "utf-8");
    assert.equal(runCli(["init", path], io), 1);
    assert.deepEqual(io.stderr, [`${path} already exists`]);
    assert.equal(readFileSync(path, "utf-8"), "keep");
  });
});

describe("starterActionSet", () => {
  it("holds only valid actions", () => {
    const set = starterActionSet();
    assert.equal(set.count, 4);
    for (const action of set) assert.equal(action.isValid, true, action.name);
  });
});
