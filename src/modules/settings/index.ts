import { existsSync, readFileSync } from "fs";
import { resolve, join } from "path";
import { z } from "zod";
import { logger } from "../../logger.js";

const log = logger.child({ module: "settings" });

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

/** Bindings file used when no path is given to load/save. */
export const DEFAULT_BINDINGS_PATH = "input.xml";

/**
 * Validates a bindings file path: must be non-empty and end in ".xml".
 */
export const BindingsPath = z
  .string()
  .trim()
  .min(1, "Bindings path must not be empty")
  .refine((p) => p.toLowerCase().endsWith(".xml"), {
    message: "Bindings path must point to an .xml file",
  });

export const InputSettingsSchema = z.object({
  /** Relative paths resolve against the working directory. */
  bindingsPath: BindingsPath.default(DEFAULT_BINDINGS_PATH),
  /** Whether saveToFile() replaces an existing file when not told otherwise. */
  overwriteOnSave: z.boolean().default(true),
});

export type InputSettings = z.infer<typeof InputSettingsSchema>;

// ---------------------------------------------------------------------------
// Paths
// ---------------------------------------------------------------------------

export function defaultSettingsPath(): string {
  return join(resolve(process.cwd(), "config"), "input.json");
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Reads settings from `path` (default: ./config/input.json).
 * A missing file yields the defaults; an unreadable or invalid file is
 * logged and also yields the defaults.
 */
export function loadInputSettings(path: string = defaultSettingsPath()): InputSettings {
  if (!existsSync(path)) return InputSettingsSchema.parse({});

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    log.warn({ err, path }, "Unable to read input settings — using defaults");
    return InputSettingsSchema.parse({});
  }

  const result = InputSettingsSchema.safeParse(raw);
  if (!result.success) {
    log.warn({ path, issues: result.error.issues.map((i) => i.message) }, "Invalid input settings — using defaults");
    return InputSettingsSchema.parse({});
  }
  return result.data;
}
