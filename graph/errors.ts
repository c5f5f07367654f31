export type CompileErrorDetail =
  | { kind: "no_lines" }
  | { kind: "talker_not_found"; lineId: number; talker: string }
  | { kind: "next_line_not_found"; lineId: number; target: number }
  | { kind: "repeated_id"; lineId: number }
  | { kind: "no_starting_dialogue" }
  | { kind: "multiple_starting_dialogues"; lineId: number };

export type TraversalErrorDetail =
  | { kind: "no_next_action" }
  | { kind: "choices_not_handled" }
  | { kind: "wrong_jump"; target: number }
  | { kind: "no_talk"; talk: string };

function describeCompileError(detail: CompileErrorDetail): string {
  switch (detail.kind) {
    case "no_lines":
      return "an empty lines list was used to build the conversation";
    case "talker_not_found":
      return `the dialogue line ${detail.lineId} has specified a non existent talker ${detail.talker}`;
    case "next_line_not_found":
      return `the dialogue line ${detail.lineId} is pointing to id ${detail.target} which was not found`;
    case "repeated_id":
      return `the dialogue line ${detail.lineId} has the same id as another dialogue`;
    case "no_starting_dialogue":
      return "no initial dialogue was found, add a 'start': true to one of the dialogue lines";
    case "multiple_starting_dialogues":
      return `too many dialogues with 'start' flag set to true (line ${detail.lineId} is the second one). Only one allowed.`;
  }
}

function describeTraversalError(detail: TraversalErrorDetail): string {
  switch (detail.kind) {
    case "no_next_action":
      return "No next action found.";
    case "choices_not_handled":
      return "Cannot advance a choice action.";
    case "wrong_jump":
      return `jumped to line ${detail.target}, but it does not exist`;
    case "no_talk":
      return `No talk named '${detail.talk}' was found`;
  }
}

export class CompileError extends Error {
  constructor(public detail: CompileErrorDetail) {
    super(describeCompileError(detail));
    this.name = "CompileError";
  }

  get kind(): CompileErrorDetail["kind"] {
    return this.detail.kind;
  }
}

export class TraversalError extends Error {
  constructor(public detail: TraversalErrorDetail) {
    super(describeTraversalError(detail));
    this.name = "TraversalError";
  }

  get kind(): TraversalErrorDetail["kind"] {
    return this.detail.kind;
  }
}
