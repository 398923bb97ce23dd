export {
  AnsiEscapeCodeBuilder,
  COLOR_THEMES,
  ESC,
  RESET_SEQUENCE,
  STYLE_CODES,
  THEME_DEFAULT_COLORS,
  isColorTheme,
  type AnsiEscapeCodeBuilderOptions,
  type AnsiEscapeCodeBuilderState,
  type ColorInput,
  type ColorTheme,
  type TextStyle,
  type ThemeDefaultColors,
} from "./builder";
export {
  assertRgbColor,
  hslToUnitRgb,
  isRgbChannel,
  normalizeColor,
  parseHexColor,
  parseHslColor,
  type RgbColor,
} from "./color";
export { InvalidColorFormatError, InvalidColorSpecError, InvalidThemeError } from "./errors";
