import { defineCommand } from "citty";
import { loadConfig } from "../../lib/config.js";
import { CONFIG_KEYS, isConfigKey } from "./constants.js";

export const configGetCommand = defineCommand({
  meta: {
    name: "get",
    description: "Get a configuration value (for scripting)",
  },
  args: {
    key: {
      type: "positional",
      description: `Configuration key (${CONFIG_KEYS.join(", ")})`,
      required: true,
    },
  },
  run: ({ args }) => {
    const key = args.key;

    if (!isConfigKey(key)) {
      console.error(`Unknown key: ${key}`);
      console.error(`Valid keys: ${CONFIG_KEYS.join(", ")}`);
      process.exit(1);
    }

    console.log(loadConfig()[key]);
  },
});
