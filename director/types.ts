import type { Choice, Talker } from "../script/types.ts";
import type { TraversalError } from "../graph/errors.ts";
import type { Logger } from "../log/logger.ts";

export type TalkRequest =
  | { type: "next"; talk: string }
  | { type: "jump"; talk: string; target: number }
  | { type: "refire"; talk: string };

export interface TextEvent {
  lineId: number;
  text: string;
  talkers: Talker[];
}

export interface ChoicesEvent {
  lineId: number;
  text: string;
  talkers: Talker[];
  choices: Choice[];
}

export interface CastEvent {
  lineId: number;
  text: string;
  talkers: Talker[];
}

export interface DirectorCallbacks {
  onText?: (talk: string, event: TextEvent) => void;
  onChoices?: (talk: string, event: ChoicesEvent) => void;
  onEnter?: (talk: string, event: CastEvent) => void;
  onExit?: (talk: string, event: CastEvent) => void;
  onError?: (talk: string, error: TraversalError) => void;
}

export interface DirectorOptions {
  callbacks?: DirectorCallbacks;
  logger?: Logger;
}
