import type { Automaton } from '../graph/frozen';
import type { NodeKind, SyntaxGraph } from '../graph/index';
import { GenerationError } from '../walker/index';

type DotNode = {
  id: string;
  label: string;
  shape: string;
  fill: string;
};

type DotEdge = {
  from: string;
  to: string;
  attrs?: string;
};

interface InspectableNode {
  readonly id: number;
  readonly kind: NodeKind;
  readonly pointer: number;
  readonly content?: string;
  readonly edges: readonly { readonly probability: number; readonly target: number }[];
  readonly cumulative: readonly number[];
}

const NODE_STYLE: Record<NodeKind, { shape: string; fill: string }> = {
  start: { shape: 'diamond', fill: 'green' },
  end: { shape: 'diamond', fill: 'red' },
  header: { shape: 'box', fill: 'lightblue' },
  pointer: { shape: 'ellipse', fill: 'yellow' },
  char: { shape: 'box', fill: 'lightgreen' },
  regex: { shape: 'box', fill: 'orange' },
  jump: { shape: 'circle', fill: 'gray' },
  generic: { shape: 'box', fill: 'white' },
};

function escapeLabel(label: string): string {
  return label
    .replace(/\\/g, '\\\\')
    .replace(/"/g, '\\"')
    .replace(/\n/g, '\\\\n')
    .replace(/\t/g, '\\\\t');
}

const dotId = (id: number): string => `n${id}`;

function nodeLabel(node: InspectableNode, ruleName: (id: number) => string | undefined): string {
  let text: string;
  switch (node.kind) {
    case 'pointer':
      text = `→${ruleName(node.pointer) ?? node.pointer}`;
      break;
    case 'header':
      text = `${node.kind.toUpperCase()} ${ruleName(node.id) ?? ''}`.trim();
      break;
    case 'char':
    case 'regex':
      text = node.content ?? node.kind.toUpperCase();
      break;
    default:
      text = node.kind.toUpperCase();
      break;
  }
  // `\n` here is DOT's own line break, added after escaping
  return `${escapeLabel(text)}\\nid:${node.id}`;
}

function collect(
  nodes: Iterable<InspectableNode>,
  ruleName: (id: number) => string | undefined,
  withCumulative: boolean,
): { dotNodes: DotNode[]; dotEdges: DotEdge[] } {
  const dotNodes: DotNode[] = [];
  const dotEdges: DotEdge[] = [];

  for (const node of nodes) {
    const style = NODE_STYLE[node.kind];
    dotNodes.push({ id: dotId(node.id), label: nodeLabel(node, ruleName), ...style });

    node.edges.forEach((edge, idx) => {
      let attrs: string | undefined;
      if (Math.abs(edge.probability - 1) >= 0.001) {
        const cf = withCumulative && node.cumulative[idx] !== undefined ? ` cf:${node.cumulative[idx].toFixed(2)}` : '';
        attrs = withCumulative
          ? `label="p:${edge.probability.toFixed(2)}${cf}", fontsize=10`
          : `label="${edge.probability.toFixed(2)}"`;
      }
      dotEdges.push({ from: dotId(node.id), to: dotId(edge.target), attrs });
    });

    if (node.kind === 'pointer') {
      dotEdges.push({ from: dotId(node.id), to: dotId(node.pointer), attrs: 'style=dashed, color=blue, label="ptr"' });
    }
  }

  return { dotNodes, dotEdges };
}

const LEGEND: readonly string[] = [
  '  subgraph cluster_legend {',
  '    label="Legend";',
  '    style=filled;',
  '    color=lightgrey;',
  '    node [shape=box, style=filled];',
  '    legend_start [label="START", fillcolor=green, shape=diamond];',
  '    legend_end [label="END", fillcolor=red, shape=diamond];',
  '    legend_header [label="HEADER", fillcolor=lightblue];',
  '    legend_pointer [label="POINTER", fillcolor=yellow, shape=ellipse];',
  '    legend_char [label="CHARACTER", fillcolor=lightgreen];',
  '    legend_regex [label="CLASS", fillcolor=orange];',
  '    legend_jump [label="JUMP", fillcolor=gray, shape=circle];',
  '  }',
];

function render(title: string, dotNodes: DotNode[], dotEdges: DotEdge[], legend: boolean): string {
  const lines: string[] = [];
  lines.push(`digraph ${title} {`);
  lines.push('  rankdir=LR;');
  lines.push('  node [shape=box];');
  for (const node of dotNodes) {
    lines.push(`  ${node.id} [label="${node.label}", shape=${node.shape}, fillcolor=${node.fill}, style=filled];`);
  }
  for (const edge of dotEdges) {
    const attrs = edge.attrs ? ` [${edge.attrs}]` : '';
    lines.push(`  ${edge.from} -> ${edge.to}${attrs};`);
  }
  if (legend) lines.push(...LEGEND);
  lines.push('}');
  return lines.join('\n');
}

/**
 * DOT rendering of a construction-time graph, with raw edge weights.
 */
export function graphToDot(graph: SyntaxGraph): string {
  const names = new Map<number, string>();
  for (const entry of graph.ruleEntries()) names.set(entry.id, entry.name);
  const { dotNodes, dotEdges } = collect(graph.values(), (id) => names.get(id), false);
  return render('SyntaxGraph', dotNodes, dotEdges, false);
}

export interface AutomatonDotOptions {
  /** Render only what is reachable from this rule's header. */
  from?: string;
  /** Breadth-first depth limit when `from` is given. */
  maxDepth?: number;
  legend?: boolean;
}

function reachable(automaton: Automaton, startId: number, maxDepth: number): InspectableNode[] {
  const visited = new Set<number>();
  const ordered: InspectableNode[] = [];
  const queue: Array<[number, number]> = [[startId, 0]];

  while (queue.length > 0) {
    const item = queue.shift();
    if (!item) break;
    const [id, depth] = item;
    if (depth > maxDepth || visited.has(id)) continue;
    visited.add(id);

    const node = automaton.findNode(id);
    if (!node) continue;
    ordered.push(node);
    for (const edge of node.edges) queue.push([edge.target, depth + 1]);
    if (node.kind === 'pointer') queue.push([node.pointer, depth + 1]);
  }
  return ordered;
}

/**
 * DOT rendering of a compiled automaton, with raw weights and cumulative
 * frequencies on branching edges.
 */
export function automatonToDot(automaton: Automaton, options: AutomatonDotOptions = {}): string {
  const ruleName = (id: number) => automaton.ruleName(id);
  let nodes: Iterable<InspectableNode> = automaton.values();

  if (options.from !== undefined) {
    const startId = automaton.ruleId(options.from);
    if (startId === undefined) {
      throw new GenerationError(`Could not find starting rule '${options.from}'`, 'unknown-start-rule');
    }
    nodes = reachable(automaton, startId, options.maxDepth ?? Number.POSITIVE_INFINITY);
  }

  const { dotNodes, dotEdges } = collect(nodes, ruleName, true);
  return render('Automaton', dotNodes, dotEdges, options.legend ?? options.from === undefined);
}
