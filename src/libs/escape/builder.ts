/**
 * ANSI SGR escape sequence builder.
 *
 * A builder is a mutable, single-owner value: setters mutate the instance and
 * return it for chaining. Share one instance between concurrent renderers and
 * the output is undefined; create one per task instead.
 */

import { assertRgbColor, normalizeColor, type RgbColor } from "./color";
import { InvalidColorSpecError, InvalidThemeError } from "./errors";

export const ESC = "\x1B";
export const RESET_SEQUENCE = `${ESC}[0m`;

export const COLOR_THEMES = ["dark", "light"] as const;
export type ColorTheme = (typeof COLOR_THEMES)[number];

export type ThemeDefaultColors = {
  fg: RgbColor;
  bg: RgbColor;
};

// dark: #e0e0e0 on #1e1e1e, light: #2e2e2e on #f0f0f0
export const THEME_DEFAULT_COLORS = {
  dark: { fg: [224, 224, 224], bg: [30, 30, 30] },
  light: { fg: [46, 46, 46], bg: [240, 240, 240] },
} as const satisfies Record<ColorTheme, ThemeDefaultColors>;

export const isColorTheme = (value: string): value is ColorTheme =>
  COLOR_THEMES.some((theme) => theme === value);

export type TextStyle = "bold" | "italic" | "underline";

export const STYLE_CODES = {
  bold: { on: "1", off: "22" },
  italic: { on: "3", off: "23" },
  underline: { on: "4", off: "24" },
} as const satisfies Record<TextStyle, { on: string; off: string }>;

export type ColorInput = {
  color?: string;
  rgb?: readonly number[];
};

export type AnsiEscapeCodeBuilderOptions = {
  theme?: string;
  /** Start without fg/bg codes instead of the theme defaults. */
  themeDefaults?: boolean;
  /**
   * Replace the previous token of a style instead of appending another one.
   * Off by default: repeated setter calls each leave a token in the output.
   */
  dedupeStyles?: boolean;
  /**
   * Swap the stored fg/bg codes in place on every `build()` while negative
   * mode is on, so consecutive builds alternate. Off by default: the swap is
   * applied to the output only and `build()` is idempotent.
   */
  persistentNegativeSwap?: boolean;
};

export type AnsiEscapeCodeBuilderState = {
  readonly theme: ColorTheme;
  readonly styles: readonly string[];
  readonly fgCode?: string;
  readonly bgCode?: string;
  readonly negative: boolean;
};

const resolveRgb = ({ color, rgb }: ColorInput): RgbColor => {
  if (color !== undefined && rgb !== undefined) {
    throw new InvalidColorSpecError(
      "Invalid color specification. Provide either a color string or RGB tuple, not both.",
    );
  }
  if (color !== undefined) {
    return normalizeColor(color);
  }
  if (rgb !== undefined) {
    return assertRgbColor(rgb);
  }
  throw new InvalidColorSpecError();
};

const toTruecolorCode = (layer: "38" | "48", [r, g, b]: RgbColor) =>
  `${layer};2;${r};${g};${b}`;

const requireTheme = (name: string): ColorTheme => {
  if (!isColorTheme(name)) {
    throw new InvalidThemeError(name);
  }
  return name;
};

export class AnsiEscapeCodeBuilder {
  private readonly styles: string[] = [];
  private fgCode?: string;
  private bgCode?: string;
  private theme: ColorTheme;
  private negative = false;
  private readonly dedupeStyles: boolean;
  private readonly persistentNegativeSwap: boolean;

  constructor(options: AnsiEscapeCodeBuilderOptions = {}) {
    this.theme = requireTheme(options.theme ?? "dark");
    this.dedupeStyles = options.dedupeStyles ?? false;
    this.persistentNegativeSwap = options.persistentNegativeSwap ?? false;
    if (options.themeDefaults !== false) {
      this.applyThemeDefaults();
    }
  }

  setBold(enabled = true): this {
    return this.pushStyle("bold", enabled);
  }

  setItalic(enabled = true): this {
    return this.pushStyle("italic", enabled);
  }

  setUnderline(enabled = true): this {
    return this.pushStyle("underline", enabled);
  }

  setFgColor(input: ColorInput): this {
    this.fgCode = toTruecolorCode("38", resolveRgb(input));
    return this;
  }

  setBgColor(input: ColorInput): this {
    this.bgCode = toTruecolorCode("48", resolveRgb(input));
    return this;
  }

  /**
   * Switch theme and reset fg/bg to its defaults, dropping explicit colors.
   */
  setTheme(name: string): this {
    this.theme = requireTheme(name);
    this.applyThemeDefaults();
    return this;
  }

  setNegative(enabled = true): this {
    this.negative = enabled;
    return this;
  }

  getState(): AnsiEscapeCodeBuilderState {
    return {
      theme: this.theme,
      styles: [...this.styles],
      fgCode: this.fgCode,
      bgCode: this.bgCode,
      negative: this.negative,
    };
  }

  build(): string {
    let fgCode = this.fgCode;
    let bgCode = this.bgCode;

    if (this.negative) {
      [fgCode, bgCode] = [bgCode, fgCode];
      if (this.persistentNegativeSwap) {
        this.fgCode = fgCode;
        this.bgCode = bgCode;
      }
    }

    const codes: string[] = [];
    if (fgCode) codes.push(fgCode);
    if (bgCode) codes.push(bgCode);
    codes.push(...this.styles);

    return `${ESC}[${codes.join(";")}m`;
  }

  render(text: string): string {
    return `${this.build()}${text}${RESET_SEQUENCE}`;
  }

  private pushStyle(style: TextStyle, enabled: boolean): this {
    const codes = STYLE_CODES[style];
    if (this.dedupeStyles) {
      const previous = this.styles.findIndex(
        (code) => code === codes.on || code === codes.off,
      );
      if (previous !== -1) {
        this.styles.splice(previous, 1);
      }
    }
    this.styles.push(enabled ? codes.on : codes.off);
    return this;
  }

  private applyThemeDefaults() {
    const colors = THEME_DEFAULT_COLORS[this.theme];
    this.fgCode = toTruecolorCode("38", colors.fg);
    this.bgCode = toTruecolorCode("48", colors.bg);
  }
}
