import type { ObjectPathRef, PatternVisitor } from './ast.js'
import { foldPattern } from './ast.js'
import { parsePattern } from './parser.js'

// --- Summary ---

/** Object types referenced by a pattern, each with the properties it tests. */
export type PatternSummary = Map<string, Set<string>>

function mention(path: ObjectPathRef): PatternSummary {
  return new Map([[path.scoType, new Set([path.prop])]])
}

function merge(parts: PatternSummary[]): PatternSummary {
  const out: PatternSummary = new Map()
  for (const part of parts) {
    for (const [type, props] of part) {
      const seen = out.get(type)
      if (seen === undefined) {
        out.set(type, new Set(props))
      } else {
        for (const prop of props) seen.add(prop)
      }
    }
  }
  return out
}

const summarizer: PatternVisitor<PatternSummary> = {
  comparison: (node) => mention(node.path),
  exists: (node) => mention(node.path),
  and: merge,
  or: merge,
  group: (inner) => inner,
}

/**
 * List the object-type/property pairs a pattern touches, in the order they
 * first appear. Throws `PatternSyntaxError` like `stixToSql`.
 */
export function summarizePattern(pattern: string): PatternSummary {
  return foldPattern(parsePattern(pattern), summarizer)
}
