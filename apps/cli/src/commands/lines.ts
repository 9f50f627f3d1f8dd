import {
  type BuildLog,
  createReader,
  LOG_CHARSETS,
  type ReaderDebugSink,
  TIMESTAMP_FORMATS,
} from "@stampline/reader";
import { defineCommand } from "citty";
import {
  openBuildLog,
  resolveCharset,
  resolveTimestampFormat,
} from "../lib/build-log.js";
import { loadConfig } from "../lib/config.js";
import { type RenderOptions, renderLine } from "../lib/render.js";
import { runWithDebug } from "../lib/session.js";
import { shouldUseColor } from "../tui/styles.js";

/**
 * Writes every decoded line of `log` and returns how many were written.
 */
export const printLog = async (
  log: BuildLog,
  options: RenderOptions & { debug?: ReaderDebugSink },
  write: (line: string) => void = console.log
): Promise<number> => {
  const reader = createReader(log, { debug: options.debug });
  let printed = 0;
  for await (const line of reader) {
    write(renderLine(line, options));
    printed++;
  }
  return printed;
};

export const linesCommand = defineCommand({
  meta: {
    name: "lines",
    description: "Print a build log with timestamps and annotations decoded",
  },
  args: {
    file: {
      type: "positional",
      description: "Path to the build log",
      required: true,
    },
    format: {
      type: "string",
      description: `Timestamp format (${TIMESTAMP_FORMATS.join(", ")})`,
    },
    charset: {
      type: "string",
      description: `Log charset (${LOG_CHARSETS.join(", ")})`,
    },
    "started-at": {
      type: "string",
      description: "Build start, as epoch milliseconds or an ISO date",
    },
    debug: {
      type: "boolean",
      description: "Write a debug log to ~/.stampline/debug",
      default: false,
    },
  },
  run: async ({ args }) => {
    await runWithDebug("lines", args.debug, async (debug) => {
      const config = loadConfig();
      const format = resolveTimestampFormat(
        args.format,
        config.timestampFormat
      );
      const charset = resolveCharset(args.charset, config.charset);
      const log = await openBuildLog(args.file, {
        charset,
        startedAt: args["started-at"],
      });

      debug?.logHeader({
        command: "lines",
        file: log.path,
        buildStart: log.build.startTimeMillis,
        timestampFormat: format,
        charset,
      });

      const printed = await printLog(log, {
        format,
        color: shouldUseColor(),
        debug,
      });
      debug?.logPhase("lines", `printed ${printed} lines`);
    });
  },
});
