import type { HueConfig } from "../../types/config";
import { HUE_CONFIG_KEYS } from "./constants";

const ensureNonEmptyString = (value: unknown, keyPath: string) => {
  if (value === undefined) return;
  if (typeof value !== "string") {
    throw new Error(`${keyPath} must be a string`);
  }
  if (value.trim() === "") {
    throw new Error(`${keyPath} must be a non-empty string`);
  }
};

const ensurePlainFileName = (value: unknown, keyPath: string) => {
  ensureNonEmptyString(value, keyPath);
  if (typeof value === "string" && /[\\/]/.test(value)) {
    throw new Error(`${keyPath} must be a file name, not a path`);
  }
};

export function validateHueConfig(config: unknown): asserts config is HueConfig {
  if (typeof config !== "object" || config === null || Array.isArray(config)) {
    throw new Error("hue config must be a JSON object");
  }

  const record = config as Record<string, unknown>;
  for (const key of HUE_CONFIG_KEYS) {
    ensureNonEmptyString(record[key], key);
  }
  ensurePlainFileName(record.manifest_file, "manifest_file");
}
