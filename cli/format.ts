import { styleText } from "node:util";
import { ScriptFormatError } from "../script/errors.ts";
import type { CompileError } from "../graph/errors.ts";
import type { AnalysisWarning, CompileWarning } from "../graph/types.ts";
import type { Choice, Talker } from "../script/types.ts";

export type Styler = (
  format: Parameters<typeof styleText>[0],
  text: string,
) => string;

export function createStyler(noColor: boolean): Styler {
  return function style(format, text) {
    if (noColor) {
      return text;
    }
    return styleText(format, text);
  };
}

export interface Diagnostic {
  lineId?: number;
  path?: string;
  message: string;
  severity: "error" | "warning";
}

export function formatErrors(
  errors: (ScriptFormatError | CompileError)[],
): Diagnostic[] {
  return errors.map((error): Diagnostic => {
    if (error instanceof ScriptFormatError) {
      return { path: error.path, message: error.message, severity: "error" };
    }
    if ("lineId" in error.detail) {
      return {
        lineId: error.detail.lineId,
        message: error.message,
        severity: "error",
      };
    }
    return { message: error.message, severity: "error" };
  });
}

export function formatWarnings(
  warnings: (CompileWarning | AnalysisWarning)[],
): Diagnostic[] {
  return warnings.map((warning): Diagnostic => ({
    lineId: warning.lineId,
    message: warning.message,
    severity: "warning",
  }));
}

function locationOf(filePath: string, diagnostic: Diagnostic): string {
  if (diagnostic.lineId !== undefined) {
    return `${filePath}#${diagnostic.lineId}:`;
  }
  if (diagnostic.path) {
    return `${filePath}@${diagnostic.path}:`;
  }
  return `${filePath}:`;
}

export function renderDiagnostics(
  diagnostics: Diagnostic[],
  filePath: string,
  style: Styler,
): string[] {
  const maxLocationWidth = diagnostics.reduce(
    (max, d) => Math.max(max, locationOf(filePath, d).length),
    0,
  );

  return diagnostics.map((diagnostic) => {
    const location = locationOf(filePath, diagnostic);
    const padding = " ".repeat(maxLocationWidth - location.length);
    const label =
      diagnostic.severity === "error"
        ? style("red", "error:")
        : style("yellow", "warning:");
    return `${style("cyan", location)}${padding} ${label} ${diagnostic.message}`;
  });
}

export function speakerOf(talkers: Talker[]): string {
  return talkers[0]?.name ?? "Narrator";
}

export function renderChoices(choices: Choice[]): string[] {
  return choices.map((choice, i) => `${i + 1}: ${choice.text}`);
}
