import { defineCommand } from "citty";
import { getConfigPath, loadConfig } from "../../lib/config.js";
import { printHeader } from "../../tui/header.js";

export const configListCommand = defineCommand({
  meta: {
    name: "list",
    description: "List all configuration values",
  },
  run: () => {
    const config = loadConfig();
    const fromEnv = Boolean(process.env.STAMPLINE_TIMESTAMP_FORMAT);

    printHeader("config list");

    console.log(`Config file: ${getConfigPath()}`);
    console.log();
    console.log(
      `timestampFormat: ${config.timestampFormat}${fromEnv ? " (from STAMPLINE_TIMESTAMP_FORMAT)" : ""}`
    );
    console.log(`charset: ${config.charset}`);
    console.log();
  },
});
