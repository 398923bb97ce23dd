import { z } from "zod";

export const themeFileSchema = z.record(
  z.string().trim().min(1, "attribute name must be non-empty"),
  z.string({ invalid_type_error: "attribute value must be a string" }),
);

export type ThemeFile = z.infer<typeof themeFileSchema>;
