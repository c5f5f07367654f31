import type { Choice, Talker } from "../script/types.ts";
import type { DiGraph } from "./digraph.ts";
import { TraversalError } from "./errors.ts";
import type { DialogueNode, NodeKind, TraversalResult } from "./types.ts";

export interface ConversationParts {
  graph: DiGraph<DialogueNode>;
  lineIndex: Map<number, number>; // line id -> node index
  lineIds: number[]; // node index -> line id
  start: number;
}

/**
 * A compiled dialogue graph with a single cursor.
 *
 * Instances come out of `compile`. The only mutations are `advance` and
 * `jumpTo`; a failed call leaves the cursor where it was.
 */
export class Conversation {
  private graph: DiGraph<DialogueNode>;
  private lineIndex: Map<number, number>;
  private idsByIndex: number[];
  private startIndex: number;
  private current: number;

  constructor(parts: ConversationParts) {
    this.graph = parts.graph;
    this.lineIndex = parts.lineIndex;
    this.idsByIndex = parts.lineIds;
    this.startIndex = parts.start;
    this.current = parts.start;
  }

  currentNode(): DialogueNode {
    return this.nodeAt(this.current);
  }

  currentId(): number {
    return this.idAt(this.current);
  }

  currentText(): string {
    return this.currentNode().text;
  }

  currentTalkers(): Talker[] {
    return this.currentNode().talkers;
  }

  currentKind(): NodeKind {
    return this.currentNode().kind;
  }

  currentChoices(): Choice[] | undefined {
    const node = this.currentNode();
    return node.kind === "choice" ? node.choices : undefined;
  }

  /** Moves along the single outgoing edge of the current line. */
  advance(): TraversalResult {
    const node = this.currentNode();
    if (node.kind === "choice") {
      return this.fail(new TraversalError({ kind: "choices_not_handled" }));
    }

    const next = this.graph.neighbors(this.current)[0];
    if (next === undefined) {
      return this.fail(new TraversalError({ kind: "no_next_action" }));
    }

    this.current = next;
    return { valid: true, value: this.currentNode(), error: null };
  }

  /**
   * Moves the cursor to any line of the conversation, whether or not it is
   * one of the current choices.
   */
  jumpTo(targetId: number): TraversalResult {
    const target = this.lineIndex.get(targetId);
    if (target === undefined) {
      return this.fail(
        new TraversalError({ kind: "wrong_jump", target: targetId }),
      );
    }

    this.current = target;
    return { valid: true, value: this.currentNode(), error: null };
  }

  get startId(): number {
    return this.idAt(this.startIndex);
  }

  get nodeCount(): number {
    return this.graph.nodeCount;
  }

  get edgeCount(): number {
    return this.graph.edgeCount;
  }

  /** Line ids in the order the lines were authored. */
  lineIds(): number[] {
    return [...this.idsByIndex];
  }

  hasLine(id: number): boolean {
    return this.lineIndex.has(id);
  }

  nodeById(id: number): DialogueNode | undefined {
    const index = this.lineIndex.get(id);
    return index === undefined ? undefined : this.graph.node(index);
  }

  successors(id: number): number[] {
    const index = this.lineIndex.get(id);
    if (index === undefined) return [];
    return this.graph.neighbors(index).map((target) => this.idAt(target));
  }

  edges(): { source: number; target: number }[] {
    return this.graph.allEdges().map((edge) => ({
      source: this.idAt(edge.source),
      target: this.idAt(edge.target),
    }));
  }

  private fail(error: TraversalError): TraversalResult {
    return { valid: false, value: null, error };
  }

  private nodeAt(index: number): DialogueNode {
    const node = this.graph.node(index);
    if (!node) {
      throw new RangeError(`No dialogue node at index ${index}`);
    }
    return node;
  }

  private idAt(index: number): number {
    const id = this.idsByIndex[index];
    if (id === undefined) {
      throw new RangeError(`No dialogue line at index ${index}`);
    }
    return id;
  }
}
