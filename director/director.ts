import type { Conversation } from "../graph/conversation.ts";
import { TraversalError } from "../graph/errors.ts";
import type { TraversalResult } from "../graph/types.ts";
import type { Logger } from "../log/logger.ts";
import type {
  DirectorCallbacks,
  DirectorOptions,
  TalkRequest,
} from "./types.ts";

/**
 * Routes next/jump/refire requests to named conversations and reports the
 * line each request lands on.
 *
 * Every conversation keeps its own cursor; requests for one talk never touch
 * another.
 */
export class TalkDirector {
  private talks = new Map<string, Conversation>();
  private callbacks?: DirectorCallbacks;
  private logger?: Logger;

  constructor(options?: DirectorOptions) {
    if (options?.callbacks) {
      this.callbacks = options.callbacks;
    }
    if (options?.logger) {
      this.logger = options.logger;
    }
  }

  add(name: string, conversation: Conversation): void {
    if (this.talks.has(name)) {
      this.logger?.forTalk(name).warn("replacing an existing talk");
    }
    this.talks.set(name, conversation);
  }

  remove(name: string): boolean {
    return this.talks.delete(name);
  }

  get(name: string): Conversation | undefined {
    return this.talks.get(name);
  }

  names(): string[] {
    return [...this.talks.keys()];
  }

  handle(request: TalkRequest): TraversalResult {
    const conversation = this.talks.get(request.talk);
    if (!conversation) {
      return this.reject(
        request.talk,
        new TraversalError({ kind: "no_talk", talk: request.talk }),
      );
    }

    let result: TraversalResult;
    switch (request.type) {
      case "next":
        result = conversation.advance();
        break;
      case "jump":
        result = conversation.jumpTo(request.target);
        break;
      case "refire":
        result = {
          valid: true,
          value: conversation.currentNode(),
          error: null,
        };
        break;
    }

    if (!result.valid) {
      return this.reject(request.talk, result.error);
    }

    this.logger
      ?.forTalk(request.talk)
      .log(`${request.type} reached line ${conversation.currentId()}`);
    this.emit(request.talk, conversation);
    return result;
  }

  private emit(talk: string, conversation: Conversation): void {
    const node = conversation.currentNode();
    const lineId = conversation.currentId();
    const base = { lineId, text: node.text, talkers: node.talkers };

    switch (node.kind) {
      case "talk":
        this.callbacks?.onText?.(talk, base);
        break;
      case "choice":
        this.callbacks?.onChoices?.(talk, { ...base, choices: node.choices });
        break;
      case "enter":
        this.callbacks?.onEnter?.(talk, base);
        break;
      case "exit":
        this.callbacks?.onExit?.(talk, base);
        break;
    }
  }

  private reject(talk: string, error: TraversalError): TraversalResult {
    this.logger?.forTalk(talk).warn(`request failed: ${error.message}`);
    this.callbacks?.onError?.(talk, error);
    return { valid: false, value: null, error };
  }
}
