import { defineCommand } from "citty";
import { configGetCommand } from "./get.js";
import { configListCommand } from "./list.js";
import { configSetCommand } from "./set.js";

export const configCommand = defineCommand({
  meta: {
    name: "config",
    description: "Manage stampline configuration",
  },
  subCommands: {
    get: configGetCommand,
    set: configSetCommand,
    list: configListCommand,
  },
});
