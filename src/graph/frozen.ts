import type { ClassSampler } from '../charclass/index';
import { CompileDefect, START_ID, type NodeKind, type SyntaxGraph } from './index';

export interface FrozenEdge {
  readonly probability: number;
  readonly target: number;
}

export interface FrozenNode {
  readonly id: number;
  readonly kind: NodeKind;
  readonly pointer: number;
  readonly edges: readonly FrozenEdge[];
  readonly cumulative: readonly number[];
  readonly content?: string;
}

/**
 * Immutable compiled grammar. Holds the node table once; walks only read it,
 * so one instance can serve any number of walks.
 */
export class Automaton {
  private readonly nodes: ReadonlyMap<number, FrozenNode>;
  private readonly rules: ReadonlyMap<string, number>;
  public readonly sampler: ClassSampler;

  constructor(nodes: ReadonlyMap<number, FrozenNode>, rules: ReadonlyMap<string, number>, sampler: ClassSampler) {
    this.nodes = nodes;
    this.rules = rules;
    this.sampler = sampler;
    Object.freeze(this);
  }

  /** Node lookup for the walker; a miss means the automaton was built wrong. */
  node(id: number): FrozenNode {
    const node = this.nodes.get(id);
    if (!node) {
      throw new CompileDefect(`Node ${id} not found in automaton`, 'missing-node');
    }
    return node;
  }

  findNode(id: number): FrozenNode | undefined {
    return this.nodes.get(id);
  }

  ruleId(name: string): number | undefined {
    return this.rules.get(name);
  }

  ruleName(id: number): string | undefined {
    for (const [name, ruleId] of this.rules) {
      if (ruleId === id) return name;
    }
    return undefined;
  }

  ruleNames(): string[] {
    return [...this.rules.keys()];
  }

  values(): IterableIterator<FrozenNode> {
    return this.nodes.values();
  }

  get start(): FrozenNode {
    return this.node(START_ID);
  }

  get size(): number {
    return this.nodes.size;
  }
}

/**
 * Consume a normalized graph and produce its automaton. Nodes are allocated
 * first and wired second, because a node may be referenced before its own
 * edges were written. The graph is sealed afterwards.
 */
export function freeze(graph: SyntaxGraph, sampler: ClassSampler): Automaton {
  if (graph.isSealed) {
    throw new CompileDefect('Graph has already been compiled', 'graph-sealed');
  }

  // Pass 1: every node, no edges yet.
  const shells = new Map<number, { node: FrozenNode; edges: FrozenEdge[] }>();
  for (const node of graph.values()) {
    const edges: FrozenEdge[] = [];
    shells.set(node.id, {
      edges,
      node: {
        id: node.id,
        kind: node.kind,
        pointer: node.pointer,
        edges,
        cumulative: Object.freeze([...node.cumulative]),
        ...(node.content !== undefined ? { content: node.content } : {}),
      },
    });
  }

  // Pass 2: wire edges against the allocated table.
  for (const node of graph.values()) {
    if (node.cumulative.length !== node.edges.length) {
      throw new CompileDefect(`Node ${node.id} has not been normalized`, 'unnormalized-node');
    }
    const shell = shells.get(node.id);
    if (!shell) {
      throw new CompileDefect(`Node ${node.id} missing from allocation pass`, 'missing-node');
    }
    for (const edge of node.edges) {
      if (!shells.has(edge.target)) {
        throw new CompileDefect(`Edge ${node.id} -> ${edge.target} points to a missing node`, 'dangling-reference');
      }
      shell.edges.push(Object.freeze({ probability: edge.probability, target: edge.target }));
    }
    if (node.kind === 'pointer') {
      const target = shells.get(node.pointer);
      if (!target || target.node.kind !== 'header') {
        throw new CompileDefect(`Pointer ${node.id} refers to ${node.pointer}, which is not a rule header`, 'dangling-pointer');
      }
    }
  }

  const nodes = new Map<number, FrozenNode>();
  for (const [id, shell] of shells) {
    Object.freeze(shell.edges);
    nodes.set(id, Object.freeze(shell.node));
  }

  const rules = new Map<string, number>();
  for (const entry of graph.ruleEntries()) {
    if (entry.declared) rules.set(entry.name, entry.id);
  }

  graph.seal();
  return new Automaton(nodes, rules, sampler);
}
