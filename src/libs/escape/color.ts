/**
 * Color normalization for truecolor SGR codes.
 *
 * Accepted inputs:
 * - `#RGB` (each nibble duplicated) and `#RRGGBB`
 * - `hsl(H,S%,L%)` with H in degrees, S and L in percent
 *
 * Channels produced from HSL are scaled by 255 and truncated, never rounded.
 */

import { InvalidColorFormatError, InvalidColorSpecError } from "./errors";

export type RgbColor = readonly [r: number, g: number, b: number];

const HEX_DIGITS = /^[0-9a-fA-F]+$/;
const NUMBER = String.raw`[+-]?(?:\d+(?:\.\d*)?|\.\d+)`;
const HSL_PATTERN = new RegExp(`^hsl\\((${NUMBER}),(${NUMBER})%,(${NUMBER})%\\)$`);

export const isRgbChannel = (value: unknown): value is number =>
  typeof value === "number" && Number.isInteger(value) && value >= 0 && value <= 255;

export const assertRgbColor = (value: readonly number[]): RgbColor => {
  const [r, g, b] = value;
  if (value.length !== 3 || !isRgbChannel(r) || !isRgbChannel(g) || !isRgbChannel(b)) {
    throw new InvalidColorSpecError(
      `RGB color must be three integers in 0..255, got [${value.join(", ")}]`,
    );
  }
  return [r, g, b];
};

export const parseHexColor = (input: string): RgbColor => {
  const digits = input.startsWith("#") ? input.slice(1) : input;
  if (!HEX_DIGITS.test(digits)) {
    throw new InvalidColorFormatError(input, `Invalid HEX color format: ${JSON.stringify(input)}`);
  }

  if (digits.length === 3) {
    const expand = (index: number) => Number.parseInt(digits.charAt(index).repeat(2), 16);
    return [expand(0), expand(1), expand(2)];
  }

  if (digits.length === 6) {
    return [
      Number.parseInt(digits.slice(0, 2), 16),
      Number.parseInt(digits.slice(2, 4), 16),
      Number.parseInt(digits.slice(4, 6), 16),
    ];
  }

  throw new InvalidColorFormatError(input, `Invalid HEX color format: ${JSON.stringify(input)}`);
};

const hueToChannel = (m1: number, m2: number, hue: number): number => {
  const h = ((hue % 1) + 1) % 1;
  if (h < 1 / 6) return m1 + (m2 - m1) * h * 6;
  if (h < 0.5) return m2;
  if (h < 2 / 3) return m1 + (m2 - m1) * (2 / 3 - h) * 6;
  return m1;
};

/**
 * Standard HSL → RGB transform on unit values (`hue` in turns).
 */
export const hslToUnitRgb = (
  hue: number,
  saturation: number,
  lightness: number,
): [number, number, number] => {
  if (saturation === 0) {
    return [lightness, lightness, lightness];
  }

  const m2 =
    lightness <= 0.5
      ? lightness * (1 + saturation)
      : lightness + saturation - lightness * saturation;
  const m1 = 2 * lightness - m2;

  return [
    hueToChannel(m1, m2, hue + 1 / 3),
    hueToChannel(m1, m2, hue),
    hueToChannel(m1, m2, hue - 1 / 3),
  ];
};

// Math.max also folds -0 from float noise into 0
const toChannel = (unit: number): number =>
  Math.min(255, Math.max(0, Math.trunc(unit * 255)));

export const parseHslColor = (input: string): RgbColor => {
  const match = HSL_PATTERN.exec(input);
  if (!match) {
    throw new InvalidColorFormatError(input, `Invalid HSL color format: ${JSON.stringify(input)}`);
  }

  const degrees = Number(match[1]);
  const saturation = Number(match[2]) / 100;
  const lightness = Number(match[3]) / 100;

  if (saturation < 0 || saturation > 1 || lightness < 0 || lightness > 1) {
    throw new InvalidColorFormatError(
      input,
      `HSL saturation and lightness must be within 0%..100%: ${JSON.stringify(input)}`,
    );
  }

  const [r, g, b] = hslToUnitRgb(degrees / 360, saturation, lightness);
  return [toChannel(r), toChannel(g), toChannel(b)];
};

export const normalizeColor = (input: string): RgbColor => {
  if (input.startsWith("#")) {
    return parseHexColor(input);
  }
  if (input.startsWith("hsl(")) {
    return parseHslColor(input);
  }
  throw new InvalidColorFormatError(input);
};
