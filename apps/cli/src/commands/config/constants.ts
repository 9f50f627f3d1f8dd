export const CONFIG_KEYS = ["timestampFormat", "charset"] as const;

export type ConfigKey = (typeof CONFIG_KEYS)[number];

export const isConfigKey = (key: string): key is ConfigKey =>
  CONFIG_KEYS.some((candidate) => candidate === key);
