/**
 * commands.ts — `input-actions` command implementations
 *
 *   input-actions check  <file>            validate a bindings file
 *   input-actions format <file> [--write]  print (or rewrite) the canonical form
 *   input-actions init   [file]            write a starter bindings file
 *
 * Kept separate from the bin entry so the commands can be run in-process.
 */

import { existsSync, readFileSync } from "fs";
import { Action } from "../modules/bindings/action.js";
import { ActionSet } from "../modules/bindings/action-set.js";
import { InputMap } from "../modules/bindings/input-map.js";
import { parseXml } from "../modules/bindings/xml.js";
import type { ParseResult } from "../modules/devices/types.js";
import { loadInputSettings } from "../modules/settings/index.js";

export interface CliOutput {
  out(line: string): void;
  err(line: string): void;
}

export const USAGE = [
  "Usage:",
  "  input-actions check  <file>",
  "  input-actions format <file> [--write]",
  "  input-actions init   [file]",
].join("\n");

/** Default bindings for a new project. */
export function starterActionSet(): ActionSet {
  return new ActionSet(
    new Action(
      "horizontal",
      new InputMap("Joystick", "Axis", "LeftStickX"),
      new InputMap("Keyboard", "Button", "D", "A"),
      new InputMap("Keyboard", "Button", "Right", "Left")
    ),
    new Action(
      "vertical",
      new InputMap("Joystick", "Axis", "LeftStickY"),
      new InputMap("Keyboard", "Button", "S", "W"),
      new InputMap("Keyboard", "Button", "Down", "Up")
    ),
    new Action(
      "jump",
      new InputMap("Keyboard", "Button", "Space"),
      new InputMap("Joystick", "Button", "A")
    ),
    new Action(
      "pause",
      new InputMap("Keyboard", "Button", "Escape"),
      new InputMap("Joystick", "Button", "Start")
    )
  );
}

function readActionSet(path: string): ParseResult<ActionSet> {
  let text: string;
  try {
    text = readFileSync(path, "utf-8");
  } catch (err) {
    return { ok: false, error: `cannot read ${path}: ${err instanceof Error ? err.message : String(err)}` };
  }
  const root = parseXml(text);
  if (!root.ok) return root;
  return ActionSet.fromXml(root.value);
}

function check(args: string[], io: CliOutput): number {
  const path = args[0];
  if (!path) {
    io.err(USAGE);
    return 1;
  }
  const set = readActionSet(path);
  if (!set.ok) {
    io.err(`${path}: ${set.error}`);
    return 1;
  }
  io.out(`${path}: ${set.value.count} action(s) — ${set.value.names().join(", ")}`);
  return 0;
}

function format(args: string[], io: CliOutput): number {
  const write = args.includes("--write");
  const path = args.find((a) => !a.startsWith("--"));
  if (!path) {
    io.err(USAGE);
    return 1;
  }
  const set = readActionSet(path);
  if (!set.ok) {
    io.err(`${path}: ${set.error}`);
    return 1;
  }
  if (!write) {
    io.out(set.value.toString().trimEnd());
    return 0;
  }
  if (!set.value.saveToFile(path, true)) {
    io.err(`${path}: unable to write file`);
    return 1;
  }
  io.out(`${path}: formatted`);
  return 0;
}

function init(args: string[], io: CliOutput): number {
  const path = args[0] ?? loadInputSettings().bindingsPath;
  if (existsSync(path)) {
    io.err(`${path} already exists`);
    return 1;
  }
  if (!starterActionSet().saveToFile(path, false)) {
    io.err(`${path}: unable to write file`);
    return 1;
  }
  io.out(`${path}: created`);
  return 0;
}

/** Runs one command; returns the process exit code. */
export function runCli(argv: string[], io: CliOutput): number {
  const [command, ...args] = argv;
  switch (command) {
    case "check":  return check(args, io);
    case "format": return format(args, io);
    case "init":   return init(args, io);
    case "help":
    case "--help":
    case "-h":
      io.out(USAGE);
      return 0;
    default:
      io.err(command ? `Unknown command: ${command}` : "No command given");
      io.err(USAGE);
      return 1;
  }
}
