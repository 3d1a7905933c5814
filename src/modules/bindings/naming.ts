/**
 * naming.ts — Action name rules
 *
 * A valid name starts with a letter or underscore and continues with
 * letters, digits or underscores: "jump", "move_x", "_debug2".
 *
 * Examples (asValidName):
 *   "  jump "      → "jump"
 *   "move left"    → "move_left"
 *   "fire-2!"      → "fire_2_"
 *   "2nd_weapon"   → "_2nd_weapon"
 */

const VALID_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

export function isValidName(name: string): boolean {
  return VALID_NAME.test(name);
}

/**
 * Normalizes a display name into a valid identifier.
 * Returns "" for blank input.
 */
export function asValidName(name: string): string {
  const trimmed = name.trim();
  if (trimmed === "") return "";
  const replaced = trimmed.replace(/[^A-Za-z0-9_]+/g, "_");
  return /^[0-9]/.test(replaced) ? `_${replaced}` : replaced;
}
