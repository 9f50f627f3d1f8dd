import { defineCommand } from "citty";
import {
  loadStoredConfig,
  type StoredConfig,
  saveConfig,
  type ValidationResult,
  validateCharset,
  validateTimestampFormat,
} from "../../lib/config.js";
import { exitWithError } from "../../utils/error.js";
import { CONFIG_KEYS, type ConfigKey, isConfigKey } from "./constants.js";

const validators: Record<ConfigKey, (value: string) => ValidationResult> = {
  timestampFormat: validateTimestampFormat,
  charset: validateCharset,
};

/**
 * Validates `value` for `key` and writes it to the config file.
 */
export const setConfigValue = (key: ConfigKey, value: string): void => {
  const trimmed = value.trim();
  const result = validators[key](trimmed);
  if (!result.valid) {
    throw new Error(result.error ?? `Invalid value for ${key}`);
  }

  const updated: StoredConfig = { ...loadStoredConfig(), [key]: trimmed };
  saveConfig(updated);
};

export const configSetCommand = defineCommand({
  meta: {
    name: "set",
    description: "Set a configuration value (for scripting)",
  },
  args: {
    key: {
      type: "positional",
      description: `Configuration key (${CONFIG_KEYS.join(", ")})`,
      required: true,
    },
    value: {
      type: "positional",
      description: "Value to set",
      required: true,
    },
  },
  run: ({ args }) => {
    const key = args.key;

    if (!isConfigKey(key)) {
      console.error(`Unknown key: ${key}`);
      process.exit(1);
    }

    try {
      setConfigValue(key, args.value);
      console.log("ok");
    } catch (error) {
      exitWithError(error);
    }
  },
});
