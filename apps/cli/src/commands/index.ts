import { defineCommand } from "citty";
import { getVersion } from "../utils/version.js";

export const main = defineCommand({
  meta: {
    name: "stampline",
    version: getVersion(),
    description: "Read build logs with inline timestamp annotations",
  },
  subCommands: {
    lines: () => import("./lines.js").then((m) => m.linesCommand),
    count: () => import("./count.js").then((m) => m.countCommand),
    version: () => import("./version.js").then((m) => m.versionCommand),
    config: () => import("./config/index.js").then((m) => m.configCommand),
  },
});
