import type { Conversation } from "./conversation.ts";
import type { AnalysisWarning } from "./types.ts";

/**
 * Reports lines that cannot be reached from the start line by following
 * next and choice links. Such lines are only reachable through scripted
 * jumps, which is legal but usually an authoring slip.
 */
export function analyzeConversation(
  conversation: Conversation,
): AnalysisWarning[] {
  const reached = new Set<number>([conversation.startId]);
  const queue = [conversation.startId];

  while (queue.length > 0) {
    const id = queue.shift();
    if (id === undefined) break;
    for (const next of conversation.successors(id)) {
      if (!reached.has(next)) {
        reached.add(next);
        queue.push(next);
      }
    }
  }

  return conversation
    .lineIds()
    .filter((id) => !reached.has(id))
    .map((id): AnalysisWarning => ({
      type: "unreachable_line",
      lineId: id,
      message: `Line ${id} is unreachable from the start line ${conversation.startId}`,
      severity: "warning",
    }));
}
