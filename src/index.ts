/**
 * input-actions — action-based input for keyboard, mouse and joystick
 *
 * Application code asks for named actions ("jump", "horizontal") and each
 * action resolves against its ordered bindings to physical inputs.
 */

export * from "./modules/devices/index.js";
export * from "./modules/bindings/index.js";
export * from "./modules/input/index.js";
export {
  loadInputSettings,
  defaultSettingsPath,
  InputSettingsSchema,
  BindingsPath,
  DEFAULT_BINDINGS_PATH,
  type InputSettings,
} from "./modules/settings/index.js";
export { logger } from "./logger.js";
