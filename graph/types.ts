import type { Choice, Talker } from "../script/types.ts";
import type { CompileError, TraversalError } from "./errors.ts";
import type { Conversation } from "./conversation.ts";

export type NodeKind = "talk" | "choice" | "enter" | "exit";

export interface TalkNode {
  kind: "talk";
  text: string;
  talkers: Talker[];
}

export interface ChoiceNode {
  kind: "choice";
  text: string;
  talkers: Talker[];
  choices: Choice[];
}

export interface EnterNode {
  kind: "enter";
  text: string;
  talkers: Talker[];
}

export interface ExitNode {
  kind: "exit";
  text: string;
  talkers: Talker[];
}

export type DialogueNode = TalkNode | ChoiceNode | EnterNode | ExitNode;

export type CompileWarningType =
  | "choices_ignored"
  | "next_ignored"
  | "action_ignored";

export interface CompileWarning {
  type: CompileWarningType;
  lineId: number;
  message: string;
}

export type CompileResult =
  | {
      valid: true;
      value: Conversation;
      error: null;
      warnings: CompileWarning[];
    }
  | {
      valid: false;
      value: null;
      error: CompileError;
      warnings: CompileWarning[];
    };

export type TraversalResult =
  | { valid: true; value: DialogueNode; error: null }
  | { valid: false; value: null; error: TraversalError };

export interface AnalysisWarning {
  type: "unreachable_line";
  lineId: number;
  message: string;
  severity: "warning";
}
