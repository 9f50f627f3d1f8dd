/**
 * Config management for the stampline CLI
 *
 * Settings live in ~/.stampline/config.json (override the directory with
 * STAMPLINE_HOME). The same directory holds debug logs.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import {
  isLogCharset,
  isTimestampFormat,
  LOG_CHARSETS,
  type LogCharset,
  TIMESTAMP_FORMATS,
  type TimestampFormat,
} from "@stampline/reader";

// ============================================================================
// Types
// ============================================================================

/**
 * StoredConfig is the raw structure persisted to disk.
 * Values are unchecked until merged.
 */
export interface StoredConfig {
  $schema?: string;
  timestampFormat?: string;
  charset?: string;
}

/**
 * Config is the merged, resolved config used by the commands
 */
export interface Config {
  timestampFormat: TimestampFormat;
  charset: LogCharset;
}

export interface ValidationResult {
  valid: boolean;
  error?: string;
}

export interface ConfigLoadResult {
  config: StoredConfig;
  error?: string;
}

// ============================================================================
// Constants
// ============================================================================

const STAMPLINE_DIR_NAME = ".stampline";
const CONFIG_FILE = "config.json";
const SCHEMA_URL = "./schema.json";

const DEFAULT_TIMESTAMP_FORMAT: TimestampFormat = "elapsed";
const DEFAULT_CHARSET: LogCharset = "utf8";

const TIMESTAMP_FORMAT_ENV = "STAMPLINE_TIMESTAMP_FORMAT";

const WINDOWS_DRIVE_PATTERN = /^[A-Za-z]:\\/;

// ============================================================================
// Path Helpers
// ============================================================================

const validateOverridePath = (path: string): string | null => {
  if (path.includes("..")) {
    return null;
  }
  if (!(path.startsWith("/") || WINDOWS_DRIVE_PATTERN.test(path))) {
    return null;
  }
  return path;
};

/**
 * Gets the stampline directory path (~/.stampline)
 * Relative or traversing STAMPLINE_HOME values are ignored.
 */
export const getStamplineDir = (): string => {
  const override = process.env.STAMPLINE_HOME;
  if (override) {
    const validated = validateOverridePath(override);
    if (validated) {
      return validated;
    }
  }
  return join(homedir(), STAMPLINE_DIR_NAME);
};

export const getConfigPath = (): string => {
  return join(getStamplineDir(), CONFIG_FILE);
};

/**
 * Creates the stampline directory if it doesn't exist
 */
export const ensureStamplineDir = (): string => {
  const dir = getStamplineDir();
  if (!existsSync(dir)) {
    mkdirSync(dir, { mode: 0o700, recursive: true });
  }
  return dir;
};

// ============================================================================
// Config Loading
// ============================================================================

const isErrnoException = (error: unknown): error is NodeJS.ErrnoException =>
  error instanceof Error && "code" in error;

const readStringField = (
  value: object,
  key: keyof StoredConfig
): string | undefined => {
  const field: unknown = Reflect.get(value, key);
  return typeof field === "string" ? field : undefined;
};

const toStoredConfig = (value: unknown): StoredConfig | undefined => {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return undefined;
  }
  const config: StoredConfig = {};
  const timestampFormat = readStringField(value, "timestampFormat");
  if (timestampFormat !== undefined) {
    config.timestampFormat = timestampFormat;
  }
  const charset = readStringField(value, "charset");
  if (charset !== undefined) {
    config.charset = charset;
  }
  return config;
};

/**
 * Loads the config with detailed error information.
 * Use this when you need to distinguish between "not found" and "corrupted".
 */
export const loadConfigSafe = (): ConfigLoadResult => {
  const configPath = getConfigPath();

  if (!existsSync(configPath)) {
    return { config: {} };
  }

  let data: string;
  try {
    data = readFileSync(configPath, "utf-8");
  } catch (error) {
    if (isErrnoException(error) && error.code === "EACCES") {
      return {
        config: {},
        error: `cannot read config at ${configPath}: permission denied`,
      };
    }
    if (isErrnoException(error) && error.code === "EISDIR") {
      return {
        config: {},
        error: `config path is a directory: ${configPath}`,
      };
    }
    return {
      config: {},
      error: `failed to load config: ${error instanceof Error ? error.message : String(error)}`,
    };
  }

  if (!data.trim()) {
    return { config: {} };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(data);
  } catch {
    return {
      config: {},
      error: `config file is corrupted: ${configPath} (invalid JSON)`,
    };
  }

  const config = toStoredConfig(parsed);
  if (!config) {
    return {
      config: {},
      error: `config file is corrupted: ${configPath} (expected an object)`,
    };
  }
  return { config };
};

/**
 * Loads the stored config.
 * Returns empty config for missing files, warns for corrupted/inaccessible files.
 */
export const loadStoredConfig = (): StoredConfig => {
  const result = loadConfigSafe();
  if (result.error) {
    console.error(`warning: ${result.error}`);
  }
  return result.config;
};

/**
 * Loads the stored config merged with defaults and environment overrides.
 */
export const loadConfig = (): Config => mergeConfig(loadStoredConfig());

// ============================================================================
// Config Merging
// ============================================================================

export const mergeConfig = (
  stored: StoredConfig,
  env: NodeJS.ProcessEnv = process.env
): Config => {
  const config: Config = {
    timestampFormat: DEFAULT_TIMESTAMP_FORMAT,
    charset: DEFAULT_CHARSET,
  };

  if (stored.timestampFormat !== undefined) {
    if (isTimestampFormat(stored.timestampFormat)) {
      config.timestampFormat = stored.timestampFormat;
    } else {
      console.error(
        `warning: ignoring invalid timestampFormat "${stored.timestampFormat}"`
      );
    }
  }

  if (stored.charset !== undefined) {
    if (isLogCharset(stored.charset)) {
      config.charset = stored.charset;
    } else {
      console.error(`warning: ignoring invalid charset "${stored.charset}"`);
    }
  }

  const envFormat = env[TIMESTAMP_FORMAT_ENV];
  if (envFormat) {
    if (isTimestampFormat(envFormat)) {
      config.timestampFormat = envFormat;
    } else {
      console.error(
        `warning: ignoring invalid ${TIMESTAMP_FORMAT_ENV} "${envFormat}"`
      );
    }
  }

  return config;
};

// ============================================================================
// Config Saving
// ============================================================================

/**
 * Saves config to ~/.stampline/config.json
 */
export const saveConfig = (config: StoredConfig): void => {
  const dir = ensureStamplineDir();

  const configWithSchema = {
    $schema: SCHEMA_URL,
    ...config,
  };

  const data = `${JSON.stringify(configWithSchema, null, 2)}\n`;
  writeFileSync(join(dir, CONFIG_FILE), data, { mode: 0o600 });
};

// ============================================================================
// Validation Helpers
// ============================================================================

export const validateTimestampFormat = (value: string): ValidationResult => {
  if (!value || value.trim() === "") {
    return { valid: false, error: "Timestamp format is required" };
  }
  if (!isTimestampFormat(value.trim())) {
    return {
      valid: false,
      error: `Timestamp format must be one of: ${TIMESTAMP_FORMATS.join(", ")}`,
    };
  }
  return { valid: true };
};

export const validateCharset = (value: string): ValidationResult => {
  if (!value || value.trim() === "") {
    return { valid: false, error: "Charset is required" };
  }
  if (!isLogCharset(value.trim())) {
    return {
      valid: false,
      error: `Charset must be one of: ${LOG_CHARSETS.join(", ")}`,
    };
  }
  return { valid: true };
};
