import { describe, expect, test } from "vitest";

import { createTheme } from "../core/loader";
import { renderThemePreview } from "../core/preview";

const theme = createTheme("/themes/monokai", [
  ["background", "#1e1e1e"],
  ["name", "Monokai"],
  ["keyword", "hsl(0,100%,50%)"],
]);

describe("renderThemePreview", () => {
  test("paints color attributes on the dark background", () => {
    expect(renderThemePreview(theme)).toEqual([
      "\x1B[38;2;30;30;30;48;2;30;30;30mbackground #1e1e1e\x1B[0m",
      "\x1B[38;2;255;0;0;48;2;30;30;30mkeyword hsl(0,100%,50%)\x1B[0m",
    ]);
  });

  test("uses the light background when asked", () => {
    expect(renderThemePreview(theme, "light")[1]).toBe(
      "\x1B[38;2;255;0;0;48;2;240;240;240mkeyword hsl(0,100%,50%)\x1B[0m",
    );
  });

  test("skips values that only look like colors", () => {
    const lookalikes = createTheme("/themes/broken", [
      ["short", "#12"],
      ["washed", "hsl(0,150%,50%)"],
      ["accent", "#fff"],
    ]);

    expect(renderThemePreview(lookalikes)).toEqual([
      "\x1B[38;2;255;255;255;48;2;30;30;30maccent #fff\x1B[0m",
    ]);
  });
});
