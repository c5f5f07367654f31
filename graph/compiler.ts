import type { Logger } from "../log/logger.ts";
import type { Choice, DialogueLine, Script, Talker } from "../script/types.ts";
import { Conversation } from "./conversation.ts";
import { DiGraph } from "./digraph.ts";
import { CompileError } from "./errors.ts";
import type { CompileResult, CompileWarning, DialogueNode } from "./types.ts";

export interface CompileOptions {
  logger?: Logger;
}

// The part of a line needed once every node exists: its outgoing links.
interface TrackedLine {
  index: number;
  id: number;
  next?: number;
  choices?: Choice[];
  end: boolean;
}

class GraphCompiler {
  private graph = new DiGraph<DialogueNode>();
  private talkers = new Map<string, Talker>();
  private tracked = new Map<number, TrackedLine>();
  private lineIds: number[] = [];
  private start: number | null = null;
  private warnings: CompileWarning[] = [];

  constructor(
    private script: Script,
    private logger?: Logger,
  ) {}

  public compile(): CompileResult {
    try {
      const conversation = this.build();
      return {
        valid: true,
        value: conversation,
        error: null,
        warnings: this.warnings,
      };
    } catch (e) {
      if (e instanceof CompileError) {
        this.logger?.error(e.message);
        return { valid: false, value: null, error: e, warnings: this.warnings };
      }
      throw e;
    }
  }

  private build(): Conversation {
    if (this.script.lines.length === 0) {
      throw new CompileError({ kind: "no_lines" });
    }

    // Later talkers with the same name replace earlier ones.
    for (const talker of this.script.talkers) {
      this.talkers.set(talker.name, talker);
    }

    for (const line of this.script.lines) {
      this.addLine(line);
    }

    if (this.start === null) {
      throw new CompileError({ kind: "no_starting_dialogue" });
    }

    for (const line of this.tracked.values()) {
      this.addEdges(line);
    }

    this.logger?.log(
      `compiled ${this.graph.nodeCount} lines and ${this.graph.edgeCount} links`,
    );

    return new Conversation({
      graph: this.graph,
      lineIndex: new Map(
        [...this.tracked.values()].map((line) => [line.id, line.index]),
      ),
      lineIds: this.lineIds,
      start: this.start,
    });
  }

  private addLine(line: DialogueLine): void {
    const talkers = this.resolveTalkers(line);
    const index = this.graph.addNode(this.createNode(line, talkers));
    this.lineIds.push(line.id);

    if (line.start === true) {
      if (this.start !== null) {
        throw new CompileError({
          kind: "multiple_starting_dialogues",
          lineId: line.id,
        });
      }
      this.start = index;
    }

    // The node for a repeated id is already in the graph; the whole graph is
    // dropped on error so it never escapes.
    if (this.tracked.has(line.id)) {
      throw new CompileError({ kind: "repeated_id", lineId: line.id });
    }
    this.tracked.set(line.id, {
      index,
      id: line.id,
      next: line.next,
      choices: line.choices,
      end: line.end === true,
    });
  }

  private resolveTalkers(line: DialogueLine): Talker[] {
    const names = [
      ...(line.talker !== undefined ? [line.talker] : []),
      ...(line.talkers ?? []),
    ];

    return names.map((name) => {
      const talker = this.talkers.get(name);
      if (!talker) {
        throw new CompileError({
          kind: "talker_not_found",
          lineId: line.id,
          talker: name,
        });
      }
      return { ...talker };
    });
  }

  private createNode(line: DialogueLine, talkers: Talker[]): DialogueNode {
    const choices = line.choices ?? [];
    const branches =
      choices.length > 0 && line.next === undefined && line.end !== true;

    if (branches) {
      if (line.action === "enter" || line.action === "exit") {
        this.warn(
          "action_ignored",
          line.id,
          `Line ${line.id} offers choices, its '${line.action}' action is ignored`,
        );
      }
      return {
        kind: "choice",
        text: line.text,
        talkers,
        choices: choices.map((choice) => ({ ...choice })),
      };
    }

    return { kind: line.action ?? "talk", text: line.text, talkers };
  }

  private addEdges(line: TrackedLine): void {
    const hasChoices = line.choices !== undefined && line.choices.length > 0;

    // End lines keep no outgoing edges, but their links must still resolve.
    if (line.end) {
      if (line.next !== undefined) {
        this.resolve(line.id, line.next);
        this.warn(
          "next_ignored",
          line.id,
          `Line ${line.id} is an end line, its next line ${line.next} is ignored`,
        );
      } else {
        for (const choice of line.choices ?? []) {
          this.resolve(line.id, choice.next);
        }
      }
      if (hasChoices) {
        this.warn(
          "choices_ignored",
          line.id,
          `Line ${line.id} is an end line, its choices are ignored`,
        );
      }
      return;
    }

    if (line.next !== undefined) {
      this.graph.addEdge(line.index, this.resolve(line.id, line.next));
      if (hasChoices) {
        this.warn(
          "choices_ignored",
          line.id,
          `Line ${line.id} has both next and choices, its choices are ignored`,
        );
      }
      return;
    }

    for (const choice of line.choices ?? []) {
      this.graph.addEdge(line.index, this.resolve(line.id, choice.next));
    }
  }

  private resolve(lineId: number, target: number): number {
    const tracked = this.tracked.get(target);
    if (!tracked) {
      throw new CompileError({ kind: "next_line_not_found", lineId, target });
    }
    return tracked.index;
  }

  private warn(
    type: CompileWarning["type"],
    lineId: number,
    message: string,
  ): void {
    this.warnings.push({ type, lineId, message });
    this.logger?.warn(message);
  }
}

/**
 * Validates a script and compiles it into a traversable conversation.
 *
 * Validation stops at the first problem found; the returned error names the
 * offending line where there is one.
 */
export function compile(
  script: Script,
  options: CompileOptions = {},
): CompileResult {
  return new GraphCompiler(script, options.logger).compile();
}
