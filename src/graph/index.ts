import { GrammarError } from '../utils/errors';
import type { Location } from '../utils/types';
import { toCumulative } from './cumulative';

export type NodeKind =
  | 'start'
  | 'header'
  | 'jump'
  | 'end'
  | 'char'
  | 'regex'
  | 'pointer'
  | 'generic';

export interface GraphEdge {
  probability: number;
  target: number;
}

export interface GraphNode {
  readonly id: number;
  kind: NodeKind;
  /** Referenced rule id; only meaningful for `pointer` nodes. */
  pointer: number;
  edges: GraphEdge[];
  cumulative: number[];
  /** Literal text for `char` nodes, class pattern for `regex` nodes. */
  content?: string;
}

export interface RuleEntry {
  readonly name: string;
  readonly id: number;
  declared: boolean;
  /** End node of the rule, allocated when the rule is declared. */
  endId?: number;
  /** Where the rule was first mentioned, declaration or reference. */
  firstSeen?: Location;
}

export type CompileDefectCode =
  | 'id-space-exhausted'
  | 'missing-node'
  | 'dangling-reference'
  | 'dangling-pointer'
  | 'unnormalized-node'
  | 'graph-sealed';

/**
 * An internal invariant was broken. Well-formed parser output never
 * produces one of these.
 */
export class CompileDefect extends GrammarError<CompileDefectCode> {
  constructor(message: string, code: CompileDefectCode) {
    super(message, code);
    this.name = 'CompileDefect';
  }
}

export const START_ID = 0;
export const FIRST_CONTROL_ID = 1;
export const LAST_CONTENT_ID = 0xffff_ffff;

/**
 * Construction-time rule graph: an arena of nodes keyed by id, with edges as
 * id references so forward references and cycles need no special handling.
 * Control ids (rules, jumps, pointers, ends) count up from 1; content ids
 * (literals, classes) count down from 2^32 - 1.
 */
export class SyntaxGraph {
  private readonly nodes = new Map<number, GraphNode>();
  private readonly rules = new Map<string, RuleEntry>();
  private nextControlId = FIRST_CONTROL_ID;
  private nextContentId = LAST_CONTENT_ID;
  private sealed = false;

  constructor() {
    this.ensureNode(START_ID, 'start');
  }

  allocateControlId(): number {
    this.assertOpen();
    if (this.nextControlId >= this.nextContentId) {
      throw new CompileDefect('Control and content id ranges collided', 'id-space-exhausted');
    }
    return this.nextControlId++;
  }

  allocateContentId(): number {
    this.assertOpen();
    if (this.nextContentId <= this.nextControlId) {
      throw new CompileDefect('Control and content id ranges collided', 'id-space-exhausted');
    }
    return this.nextContentId--;
  }

  /** Find the node with this id, creating it with `kind` when absent. */
  ensureNode(id: number, kind: NodeKind): GraphNode {
    const existing = this.nodes.get(id);
    if (existing) {
      if (existing.kind === 'generic' && kind !== 'generic') existing.kind = kind;
      return existing;
    }
    this.assertOpen();
    const node: GraphNode = { id, kind, pointer: 0, edges: [], cumulative: [] };
    this.nodes.set(id, node);
    return node;
  }

  find(id: number): GraphNode | undefined {
    return this.nodes.get(id);
  }

  get(id: number): GraphNode {
    const node = this.nodes.get(id);
    if (!node) {
      throw new CompileDefect(`Node ${id} not found in graph`, 'missing-node');
    }
    return node;
  }

  addEdge(from: number, to: number, probability: number): void {
    this.assertOpen();
    this.get(from).edges.push({ probability, target: to });
  }

  /**
   * Id of the rule called `name`, reserving one on first mention. The id is
   * the same whether the first mention is a definition or a forward use.
   */
  referenceRule(name: string, location?: Location): RuleEntry {
    const existing = this.rules.get(name);
    if (existing) return existing;
    const entry: RuleEntry = { name, id: this.allocateControlId(), declared: false, firstSeen: location };
    this.rules.set(name, entry);
    return entry;
  }

  /**
   * Mark `name` as defined and create its header and end nodes. A rule
   * declared twice keeps its first end node; `redeclared` flags it.
   */
  declareRule(name: string, location?: Location): { entry: RuleEntry; endId: number; redeclared: boolean } {
    const entry = this.referenceRule(name, location);
    const redeclared = entry.declared;
    entry.declared = true;
    this.ensureNode(entry.id, 'header');
    const endId = entry.endId ?? this.ensureNode(this.allocateControlId(), 'end').id;
    entry.endId = endId;
    return { entry, endId, redeclared };
  }

  rule(name: string): RuleEntry | undefined {
    return this.rules.get(name);
  }

  ruleEntries(): RuleEntry[] {
    return [...this.rules.values()];
  }

  undeclaredRules(): RuleEntry[] {
    return this.ruleEntries().filter((entry) => !entry.declared);
  }

  values(): IterableIterator<GraphNode> {
    return this.nodes.values();
  }

  get size(): number {
    return this.nodes.size;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  /**
   * Recompute every node's cumulative frequencies from its raw edge weights.
   * Returns the ids of nodes whose weights summed to zero and were given
   * equal weights instead.
   */
  normalize(): number[] {
    this.assertOpen();
    const uniform: number[] = [];
    for (const node of this.nodes.values()) {
      const distribution = toCumulative(node.edges.map((edge) => edge.probability));
      node.cumulative = distribution.cumulative;
      if (distribution.uniform) uniform.push(node.id);
    }
    return uniform;
  }

  /** Called by the compiler once the graph has been consumed. */
  seal(): void {
    this.sealed = true;
  }

  private assertOpen(): void {
    if (this.sealed) {
      throw new CompileDefect('Graph has already been compiled and can no longer change', 'graph-sealed');
    }
  }
}

export { toCumulative, pickIndex } from './cumulative';
export type { CumulativeDistribution } from './cumulative';
