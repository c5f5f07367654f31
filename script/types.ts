import type { ScriptFormatError } from "./errors.ts";

export interface Talker {
  name: string;
  asset: string; // portrait or sprite reference, opaque to the compiler
}

export interface Choice {
  text: string;
  next: number; // target line id
}

export const LineActions = ["talk", "enter", "exit"] as const;
export type LineAction = (typeof LineActions)[number];

export interface DialogueLine {
  id: number;
  text: string;
  talker?: string;
  talkers?: string[]; // extra speakers, mostly for enter/exit lines
  action?: LineAction; // defaults to "talk"
  choices?: Choice[];
  next?: number;
  start?: boolean;
  end?: boolean;
}

export interface Script {
  talkers: Talker[];
  lines: DialogueLine[];
}

export interface ScriptLoadResult {
  value: Script | null;
  errors: ScriptFormatError[];
  valid: boolean;
}
