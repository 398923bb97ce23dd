export type { LoadHueConfigOptions } from "./loader";
export { loadHueConfig, resolveHueConfig } from "./loader";
export {
  DEFAULT_LOG_FILENAME,
  DEFAULT_MANIFEST_FILENAME,
  DEFAULT_THEMES_DIR,
  DEFAULT_THEME_NAME,
  HUE_CONFIG_FILENAME,
  HUE_CONFIG_KEYS,
} from "./constants";
export { validateHueConfig } from "./validator";
