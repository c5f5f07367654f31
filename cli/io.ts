import fs from "node:fs/promises";
import { parseScript } from "../script/loader.ts";
import type { ScriptLoadResult } from "../script/types.ts";

export async function loadScriptFile(
  filePath: string,
): Promise<ScriptLoadResult> {
  const source = await fs.readFile(filePath, { encoding: "utf-8" });
  return parseScript(source);
}
