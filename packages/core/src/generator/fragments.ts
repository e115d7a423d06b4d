// ── Shared SQL helpers ─────────────────────────────────────────

/** Escape a double-quoted SQL identifier by doubling internal double-quotes. */
export function escapeIdentDQ(value: string): string {
  return value.replace(/"/g, '""')
}

/** Quote an identifier that has already passed `validateName` or `validatePath`. */
export function quoteIdent(value: string): string {
  return `"${escapeIdentDQ(value)}"`
}

/** `"table"."column"`, or just `"column"`; `*` stays bare. */
export function quoteColumnRef(name: string, table?: string | undefined): string {
  const col = name === '*' ? '*' : quoteIdent(name)
  return table !== undefined ? `${quoteIdent(table)}.${col}` : col
}

/** Single-quoted SQL string literal. Pattern literals are embedded, never bound. */
export function quoteLiteral(value: string): string {
  return `'${value.replace(/'/g, "''")}'`
}
