import { command } from "cleye";
import fs from "node:fs/promises";
import { compile } from "../../graph/compiler.ts";
import { exportDot, exportJson } from "../../graph/export.ts";
import type { LogSink } from "../../log/logger.ts";
import { createStyler, formatErrors, renderDiagnostics } from "../format.ts";
import { loadScriptFile } from "../io.ts";

type ExportFormat = "json" | "dot";

export interface CompileFlags {
  output?: string;
  format: string;
  pretty: boolean;
  noColor: boolean;
}

function ExportFormat(format: string): ExportFormat {
  if (format !== "json" && format !== "dot") {
    throw new Error(`Invalid export format: "${format}"`);
  }
  return format;
}

/** Compiles one script and writes its graph. Returns false on any error. */
export async function compileFile(
  file: string,
  flags: CompileFlags,
  out: LogSink = console,
): Promise<boolean> {
  const format = ExportFormat(flags.format);
  const style = createStyler(flags.noColor);

  const fail = (errors: Parameters<typeof formatErrors>[0]) => {
    for (const line of renderDiagnostics(formatErrors(errors), file, style)) {
      out.error(line);
    }
    return false;
  };

  const loadResult = await loadScriptFile(file);
  if (!loadResult.value) {
    return fail(loadResult.errors);
  }

  const compileResult = compile(loadResult.value);
  if (!compileResult.valid) {
    return fail([compileResult.error]);
  }

  const conversation = compileResult.value;
  const rendered =
    format === "dot"
      ? exportDot(conversation)
      : JSON.stringify(
          exportJson(conversation),
          null,
          flags.pretty ? 2 : undefined,
        );

  if (flags.output) {
    await fs.writeFile(flags.output, rendered + "\n", { encoding: "utf-8" });
    out.log(style("green", `Wrote ${format} output to ${flags.output}`));
  } else {
    out.log(rendered);
  }
  return true;
}

export const compileCommand = command(
  {
    name: "compile",
    help: {
      description: "Compile a dialogue script into its graph representation",
    },
    parameters: ["<file>"],
    flags: {
      output: {
        type: String,
        alias: "o",
        description: "File path to write the output to",
      },
      format: {
        type: String,
        alias: "f",
        description: "Output format: json (default) or dot",
        default: "json",
      },
      pretty: {
        type: Boolean,
        alias: "p",
        description: "Format JSON output with indentation",
        default: false,
      },
      noColor: {
        type: Boolean,
        description: "Disable colorized text output",
        default: false,
      },
    },
  },
  async (argv) => {
    if (!(await compileFile(argv._.file, argv.flags))) {
      process.exitCode = 1;
    }
  },
);
