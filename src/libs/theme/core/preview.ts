import {
  AnsiEscapeCodeBuilder,
  InvalidColorFormatError,
  normalizeColor,
  type ColorTheme,
} from "../../escape";
import type { Theme } from "./types";

const isColorValue = (value: string): boolean => {
  try {
    normalizeColor(value);
    return true;
  } catch (error) {
    if (error instanceof InvalidColorFormatError) {
      return false;
    }
    throw error;
  }
};

/**
 * One line per color attribute, painted in its own color on the builder
 * theme's background. Attributes that are not colors are left out.
 */
export const renderThemePreview = (theme: Theme, colorTheme: ColorTheme = "dark"): string[] =>
  theme
    .listAttributes()
    .filter(([, value]) => isColorValue(value))
    .map(([name, value]) =>
      new AnsiEscapeCodeBuilder({ theme: colorTheme })
        .setFgColor({ color: value })
        .render(`${name} ${value}`),
    );
