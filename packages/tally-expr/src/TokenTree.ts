/** Token tree nodes, as recognized by the expression grammar. */

/** kinds for the infix operator nodes */
export type OperatorKind =
  | "add"
  | "subtract"
  | "multiply"
  | "divide"
  | "modulo"
  | "power";

export type LeafKind =
  | "number"
  | OperatorKind
  | "unary_minus"
  | "function_name";

export type BranchKind = "expr" | "function" | "function_args" | "equation";

export type NodeKind = LeafKind | BranchKind;

export interface TokenNode {
  readonly kind: NodeKind;

  /** src text spanned by this node */
  readonly text: string;

  readonly start: number;
  readonly end: number;

  readonly children: readonly TokenNode[];
}

/** a matched region of the src */
export interface SrcSpan {
  src: string;
  start: number;
  end: number;
}

const branchKinds: ReadonlySet<NodeKind> = new Set<BranchKind>([
  "expr",
  "function",
  "function_args",
  "equation",
]);

export function makeNode(
  kind: NodeKind,
  span: SrcSpan,
  children: readonly TokenNode[] = []
): TokenNode {
  const { src, start, end } = span;
  return { kind, text: src.slice(start, end), start, end, children };
}

/**
 * Render a token tree on one line.
 *  branch nodes show as kind(child, child), leaves as kind 'text'
 */
export function tokenTreeToString(node: TokenNode): string {
  if (!branchKinds.has(node.kind)) {
    return `${node.kind} '${node.text}'`;
  }
  const children = node.children.map(tokenTreeToString).join(", ");
  return `${node.kind}(${children})`;
}
