import { command } from "cleye";
import { analyzeConversation } from "../../graph/analysis.ts";
import { compile } from "../../graph/compiler.ts";
import { Logger, type LogSink } from "../../log/logger.ts";
import {
  createStyler,
  formatErrors,
  formatWarnings,
  renderDiagnostics,
  type Diagnostic,
  type Styler,
} from "../format.ts";
import { loadScriptFile } from "../io.ts";

type OutputFormat = "text" | "json";
type Level = "error" | "warning";

export interface CheckFlags {
  format: string;
  level: string;
  noColor: boolean;
  verbose: boolean;
}

function OutputFormat(format: string): OutputFormat {
  if (format !== "text" && format !== "json") {
    throw new Error(`Invalid output format: "${format}"`);
  }
  return format;
}

function Level(level: string): Level {
  if (level !== "error" && level !== "warning") {
    throw new Error(`Invalid diagnostic level: "${level}"`);
  }
  return level;
}

function report(
  diagnostics: Diagnostic[],
  filePath: string,
  format: OutputFormat,
  style: Styler,
  out: LogSink,
): void {
  switch (format) {
    case "text":
      for (const line of renderDiagnostics(diagnostics, filePath, style)) {
        out.error(line);
      }
      break;
    case "json":
      out.log(JSON.stringify({ file: filePath, diagnostics }, null, 2));
      break;
  }
}

/**
 * Loads, compiles and analyzes every file, printing its diagnostics.
 * Returns the number of files that failed to load or compile.
 */
export async function check(
  files: string[],
  flags: CheckFlags,
  out: LogSink = console,
): Promise<number> {
  const format = OutputFormat(flags.format);
  const level = Level(flags.level);
  const style = createStyler(flags.noColor);
  const logger = new Logger("compiler", { enabled: flags.verbose, sink: out });
  let failures = 0;

  for (const filePath of files) {
    try {
      const loadResult = await loadScriptFile(filePath);
      if (!loadResult.value) {
        report(formatErrors(loadResult.errors), filePath, format, style, out);
        failures++;
        continue;
      }

      const compileResult = compile(loadResult.value, { logger });
      const diagnostics: Diagnostic[] = [];
      if (!compileResult.valid) {
        diagnostics.push(...formatErrors([compileResult.error]));
        failures++;
      }

      if (level === "warning") {
        diagnostics.push(...formatWarnings(compileResult.warnings));
        if (compileResult.valid) {
          diagnostics.push(
            ...formatWarnings(analyzeConversation(compileResult.value)),
          );
        }
      }

      if (diagnostics.length > 0 || format === "json") {
        report(diagnostics, filePath, format, style, out);
      } else {
        out.log(
          style(
            "green",
            `Check of ${filePath} completed successfully. No issues found.`,
          ),
        );
      }
    } catch (error) {
      failures++;
      if (error instanceof Error) {
        out.error(
          `${style("red", "Error")} reading file ${filePath}: ${error.message}`,
        );
      } else {
        out.error(`Error reading file ${filePath}:`, error);
      }
    }
  }

  return failures;
}

export const checkCommand = command(
  {
    name: "check",
    help: {
      description: "Validate dialogue scripts and report errors and warnings",
    },
    parameters: ["<files...>"],
    flags: {
      format: {
        type: String,
        alias: "f",
        description: "Output format: text (default) or json",
        default: "text",
      },
      level: {
        type: String,
        alias: "l",
        description: "Minimum diagnostic level: error (default) or warning",
        default: "error",
      },
      noColor: {
        type: Boolean,
        description: "Disable colorized text output",
        default: false,
      },
      verbose: {
        type: Boolean,
        alias: "v",
        description: "Log compiler activity",
        default: false,
      },
    },
  },
  async (argv) => {
    const failures = await check(argv._.files, argv.flags);
    if (failures > 0) {
      process.exitCode = 1;
    }
  },
);
