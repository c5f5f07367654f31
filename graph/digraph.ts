export interface Edge {
  source: number;
  target: number;
}

/**
 * Arena-backed directed graph. Node handles are array indices and stay stable
 * because nodes are never removed.
 */
export class DiGraph<N> {
  private nodes: N[] = [];
  private edges: Edge[] = [];
  private outgoing: number[][] = [];

  addNode(node: N): number {
    this.nodes.push(node);
    this.outgoing.push([]);
    return this.nodes.length - 1;
  }

  addEdge(source: number, target: number): void {
    const sourceEdges = this.outgoing[source];
    if (!sourceEdges || target < 0 || target >= this.nodes.length) {
      throw new RangeError(`Edge ${source} -> ${target} is out of bounds`);
    }
    sourceEdges.push(target);
    this.edges.push({ source, target });
  }

  node(index: number): N | undefined {
    return this.nodes[index];
  }

  neighbors(index: number): readonly number[] {
    return this.outgoing[index] ?? [];
  }

  get nodeCount(): number {
    return this.nodes.length;
  }

  get edgeCount(): number {
    return this.edges.length;
  }

  allEdges(): readonly Edge[] {
    return this.edges;
  }
}
