import { test, describe } from "node:test";
import assert from "node:assert";
import { DiGraph } from "./digraph.ts";

describe("DiGraph", () => {
  test("Hands out sequential node indices", () => {
    const graph = new DiGraph<string>();
    assert.strictEqual(graph.addNode("a"), 0);
    assert.strictEqual(graph.addNode("b"), 1);
    assert.strictEqual(graph.nodeCount, 2);
    assert.strictEqual(graph.node(1), "b");
    assert.strictEqual(graph.node(2), undefined);
  });

  test("Keeps outgoing edges in insertion order, self-loops included", () => {
    const graph = new DiGraph<string>();
    const a = graph.addNode("a");
    const b = graph.addNode("b");
    graph.addEdge(a, b);
    graph.addEdge(a, a);

    assert.deepStrictEqual(graph.neighbors(a), [b, a]);
    assert.deepStrictEqual(graph.neighbors(b), []);
    assert.strictEqual(graph.edgeCount, 2);
    assert.deepStrictEqual(graph.allEdges(), [
      { source: 0, target: 1 },
      { source: 0, target: 0 },
    ]);
  });

  test("Rejects edges to unknown nodes", () => {
    const graph = new DiGraph<string>();
    const a = graph.addNode("a");
    assert.throws(() => graph.addEdge(a, 5), RangeError);
    assert.throws(() => graph.addEdge(3, a), RangeError);
    assert.strictEqual(graph.edgeCount, 0);
  });
});
