import type { Choice } from "../script/types.ts";
import type { Conversation } from "./conversation.ts";
import type { NodeKind } from "./types.ts";

export interface ExportedLine {
  id: number;
  kind: NodeKind;
  text: string;
  talkers: string[];
  choices?: Choice[];
}

export interface ExportedConversation {
  start: number;
  nodes: ExportedLine[];
  edges: { source: number; target: number }[];
}

export function exportJson(conversation: Conversation): ExportedConversation {
  const nodes: ExportedLine[] = [];

  for (const id of conversation.lineIds()) {
    const node = conversation.nodeById(id);
    if (!node) continue;

    const line: ExportedLine = {
      id,
      kind: node.kind,
      text: node.text,
      talkers: node.talkers.map((talker) => talker.name),
    };
    if (node.kind === "choice") {
      line.choices = node.choices.map((choice) => ({ ...choice }));
    }
    nodes.push(line);
  }

  return { start: conversation.startId, nodes, edges: conversation.edges() };
}

function quote(text: string): string {
  return `"${text.replace(/\\/g, "\\\\").replace(/"/g, '\\"').replace(/\n/g, "\\n")}"`;
}

/** Renders the conversation as a Graphviz digraph. */
export function exportDot(conversation: Conversation): string {
  const exported = exportJson(conversation);
  const lines = ["digraph conversation {"];

  for (const node of exported.nodes) {
    const shape =
      node.id === exported.start
        ? "doublecircle"
        : node.kind === "choice"
          ? "diamond"
          : "box";
    lines.push(`  ${node.id} [label=${quote(node.text)}, shape=${shape}];`);
  }

  // Choice links are labelled from the node's own choices.
  for (const node of exported.nodes) {
    if (node.choices) {
      for (const choice of node.choices) {
        lines.push(`  ${node.id} -> ${choice.next} [label=${quote(choice.text)}];`);
      }
      continue;
    }
    for (const edge of exported.edges) {
      if (edge.source === node.id) {
        lines.push(`  ${edge.source} -> ${edge.target};`);
      }
    }
  }

  lines.push("}");
  return lines.join("\n");
}
