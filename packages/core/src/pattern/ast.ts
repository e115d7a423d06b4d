// --- Pattern AST ---

export type ComparisonOp = '=' | '!=' | '<' | '>' | '<=' | '>=' | 'IN' | 'LIKE' | 'MATCHES' | 'ISSUBSET' | 'ISSUPERSET'

export type Literal =
  | { type: 'string'; value: string }
  | { type: 'int'; value: string }
  | { type: 'float'; value: string }
  | { type: 'bool'; value: boolean }
  | { type: 'timestamp'; value: string }
  /** base64 text; hex literals are converted when parsed */
  | { type: 'binary'; value: string }

export interface ObjectPathRef {
  /** Full path text as written, e.g. `network-traffic:src_ref.value` */
  text: string
  scoType: string
  prop: string
}

export interface ComparisonNode {
  kind: 'comparison'
  path: ObjectPathRef
  negated: boolean
  op: ComparisonOp
  /** A list only for `IN` */
  value: Literal | Literal[]
}

export interface ExistsNode {
  kind: 'exists'
  path: ObjectPathRef
}

export interface BooleanNode {
  kind: 'and' | 'or'
  operands: PatternNode[]
}

/** Parentheses written in the pattern */
export interface GroupNode {
  kind: 'group'
  expr: PatternNode
}

export type PatternNode = ComparisonNode | ExistsNode | BooleanNode | GroupNode

// --- Fold ---

/** Leaf and combinator actions for walking a pattern AST. */
export interface PatternVisitor<T> {
  comparison(node: ComparisonNode): T
  exists(node: ExistsNode): T
  and(operands: T[]): T
  or(operands: T[]): T
  group(inner: T): T
}

export function foldPattern<T>(node: PatternNode, visitor: PatternVisitor<T>): T {
  switch (node.kind) {
    case 'comparison':
      return visitor.comparison(node)
    case 'exists':
      return visitor.exists(node)
    case 'and':
      return visitor.and(node.operands.map((n) => foldPattern(n, visitor)))
    case 'or':
      return visitor.or(node.operands.map((n) => foldPattern(n, visitor)))
    case 'group':
      return visitor.group(foldPattern(node.expr, visitor))
  }
}
