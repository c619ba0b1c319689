// Undirected, unweighted graph keyed by display name

export interface GraphNode {
  name: string;
  numericId?: string;
}

export interface GraphEdge {
  source: string;
  target: string;
}

const EDGE_SEPARATOR = '\u0000';

export class RelationshipGraph {
  private nodes = new Map<string, GraphNode>();
  private edges = new Map<string, GraphEdge>();
  private adjacency = new Map<string, Set<string>>();

  addNode(name: string, numericId?: string): void {
    const existing = this.nodes.get(name);
    if (existing) {
      if (existing.numericId === undefined && numericId !== undefined) {
        existing.numericId = numericId;
      }
      return;
    }
    this.nodes.set(name, { name, numericId });
    this.adjacency.set(name, new Set());
  }

  /**
   * Adds the edge and both endpoints. Returns false when the edge already
   * existed or would be a self-loop.
   */
  addEdge(a: string, b: string): boolean {
    if (a === b) return false;

    const key = RelationshipGraph.edgeKey(a, b);
    if (this.edges.has(key)) return false;

    this.addNode(a);
    this.addNode(b);
    const [source, target] = a < b ? [a, b] : [b, a];
    this.edges.set(key, { source, target });
    this.adjacency.get(a)?.add(b);
    this.adjacency.get(b)?.add(a);
    return true;
  }

  hasNode(name: string): boolean {
    return this.nodes.has(name);
  }

  hasEdge(a: string, b: string): boolean {
    return this.edges.has(RelationshipGraph.edgeKey(a, b));
  }

  neighbors(name: string): string[] {
    return [...(this.adjacency.get(name) ?? [])];
  }

  getNodes(): GraphNode[] {
    return [...this.nodes.values()].map(node => ({ ...node }));
  }

  getEdges(): GraphEdge[] {
    return [...this.edges.values()].map(edge => ({ ...edge }));
  }

  get nodeCount(): number {
    return this.nodes.size;
  }

  get edgeCount(): number {
    return this.edges.size;
  }

  private static edgeKey(a: string, b: string): string {
    return a < b ? `${a}${EDGE_SEPARATOR}${b}` : `${b}${EDGE_SEPARATOR}${a}`;
  }
}
