import {
  type BuildLog,
  createReader,
  LOG_CHARSETS,
  type ReaderDebugSink,
} from "@stampline/reader";
import { defineCommand } from "citty";
import { openBuildLog, resolveCharset } from "../lib/build-log.js";
import { loadConfig } from "../lib/config.js";
import { runWithDebug } from "../lib/session.js";

export const countLines = (
  log: BuildLog,
  debug?: ReaderDebugSink
): Promise<number> => createReader(log, { debug }).lineCount();

export const countCommand = defineCommand({
  meta: {
    name: "count",
    description: "Print the number of lines in a build log",
  },
  args: {
    file: {
      type: "positional",
      description: "Path to the build log",
      required: true,
    },
    charset: {
      type: "string",
      description: `Log charset (${LOG_CHARSETS.join(", ")})`,
    },
    debug: {
      type: "boolean",
      description: "Write a debug log to ~/.stampline/debug",
      default: false,
    },
  },
  run: async ({ args }) => {
    await runWithDebug("count", args.debug, async (debug) => {
      const charset = resolveCharset(args.charset, loadConfig().charset);
      const log = await openBuildLog(args.file, { charset });

      debug?.logHeader({
        command: "count",
        file: log.path,
        buildStart: log.build.startTimeMillis,
        charset,
      });

      console.log(await countLines(log, debug));
    });
  },
});
