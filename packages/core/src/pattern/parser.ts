import { EmbeddedActionsParser } from 'chevrotain'
import type { IToken } from 'chevrotain'
import { PatternSyntaxError } from '@stixql/validation'
import type { ComparisonOp, Literal, ObjectPathRef, PatternNode } from './ast.js'
import {
  allTokens,
  And,
  BinaryLiteral,
  BoolLiteral,
  Comma,
  Equal,
  Exists,
  FloatLiteral,
  FollowedBy,
  Greater,
  GreaterEqual,
  HexLiteral,
  In,
  IntLiteral,
  IsSubset,
  IsSuperset,
  LBracket,
  Less,
  LessEqual,
  Like,
  LParen,
  Matches,
  Not,
  NotEqual,
  ObjectPath,
  Or,
  RBracket,
  Repeats,
  RParen,
  Seconds,
  Start,
  StixLexer,
  Stop,
  StringLiteral,
  Times,
  TimestampLiteral,
  Within,
} from './lexer.js'

// ── Parser ─────────────────────────────────────────────────────
//
//   pattern       := followedBy
//   followedBy    := obsOr (FOLLOWEDBY obsOr)*
//   obsOr         := obsAnd (OR obsAnd)*
//   obsAnd        := qualified (AND qualified)*
//   qualified     := observation qualifier*
//   observation   := '[' compOr ']' | '(' followedBy ')'
//   compOr        := compAnd (OR compAnd)*
//   compAnd       := propTest (AND propTest)*
//   propTest      := '(' compOr ')' | EXISTS path | path NOT? operation
//
// Time qualifiers are parsed and dropped; FOLLOWEDBY is read as AND.

interface Operation {
  op: ComparisonOp
  value: Literal | Literal[]
}

class StixPatternParser extends EmbeddedActionsParser {
  constructor() {
    super(allTokens, { recoveryEnabled: false })
    this.performSelfAnalysis()
  }

  pattern = this.RULE('pattern', (): PatternNode => this.SUBRULE(this.followedBy))

  private followedBy = this.RULE('followedBy', (): PatternNode => {
    const operands = [this.SUBRULE(this.obsOr)]
    this.MANY(() => {
      this.CONSUME(FollowedBy)
      operands.push(this.SUBRULE2(this.obsOr))
    })
    return combine('and', operands)
  })

  private obsOr = this.RULE('obsOr', (): PatternNode => {
    const operands = [this.SUBRULE(this.obsAnd)]
    this.MANY(() => {
      this.CONSUME(Or)
      operands.push(this.SUBRULE2(this.obsAnd))
    })
    return combine('or', operands)
  })

  private obsAnd = this.RULE('obsAnd', (): PatternNode => {
    const operands = [this.SUBRULE(this.qualified)]
    this.MANY(() => {
      this.CONSUME(And)
      operands.push(this.SUBRULE2(this.qualified))
    })
    return combine('and', operands)
  })

  private qualified = this.RULE('qualified', (): PatternNode => {
    const node = this.SUBRULE(this.observation)
    this.MANY(() => this.SUBRULE(this.qualifier))
    return node
  })

  private observation = this.RULE('observation', (): PatternNode =>
    this.OR<PatternNode>([
      {
        ALT: () => {
          this.CONSUME(LBracket)
          const node = this.SUBRULE(this.compOr)
          this.CONSUME(RBracket)
          return node
        },
      },
      {
        ALT: () => {
          this.CONSUME(LParen)
          const node = this.SUBRULE(this.followedBy)
          this.CONSUME(RParen)
          return group(node)
        },
      },
    ]),
  )

  private qualifier = this.RULE('qualifier', () => {
    this.OR([
      {
        ALT: () => {
          this.CONSUME(Within)
          this.OR2<IToken>([{ ALT: () => this.CONSUME(IntLiteral) }, { ALT: () => this.CONSUME(FloatLiteral) }])
          this.CONSUME(Seconds)
        },
      },
      {
        ALT: () => {
          this.CONSUME(Repeats)
          this.CONSUME2(IntLiteral)
          this.CONSUME(Times)
        },
      },
      {
        ALT: () => {
          this.CONSUME(Start)
          this.CONSUME(TimestampLiteral)
          this.CONSUME(Stop)
          this.CONSUME2(TimestampLiteral)
        },
      },
    ])
  })

  private compOr = this.RULE('compOr', (): PatternNode => {
    const operands = [this.SUBRULE(this.compAnd)]
    this.MANY(() => {
      this.CONSUME(Or)
      operands.push(this.SUBRULE2(this.compAnd))
    })
    return combine('or', operands)
  })

  private compAnd = this.RULE('compAnd', (): PatternNode => {
    const operands = [this.SUBRULE(this.propTest)]
    this.MANY(() => {
      this.CONSUME(And)
      operands.push(this.SUBRULE2(this.propTest))
    })
    return combine('and', operands)
  })

  private propTest = this.RULE('propTest', (): PatternNode =>
    this.OR<PatternNode>([
      {
        ALT: () => {
          this.CONSUME(LParen)
          const node = this.SUBRULE(this.compOr)
          this.CONSUME(RParen)
          return group(node)
        },
      },
      {
        ALT: () => {
          this.CONSUME(Exists)
          const path = this.SUBRULE(this.path)
          return { kind: 'exists', path }
        },
      },
      {
        ALT: () => {
          const path = this.SUBRULE2(this.path)
          const negated = this.OPTION(() => this.CONSUME(Not)) !== undefined
          const { op, value } = this.SUBRULE(this.operation)
          return { kind: 'comparison', path, negated, op, value }
        },
      },
    ]),
  )

  private operation = this.RULE('operation', (): Operation =>
    this.OR<Operation>([
      {
        ALT: () => {
          const op = this.SUBRULE(this.comparisonOp)
          return { op, value: this.SUBRULE(this.literal) }
        },
      },
      {
        ALT: () => {
          this.CONSUME(In)
          return { op: 'IN' as const, value: this.SUBRULE(this.literalSet) }
        },
      },
      {
        ALT: () => {
          this.CONSUME(Like)
          return { op: 'LIKE' as const, value: this.SUBRULE(this.stringLiteral) }
        },
      },
      {
        ALT: () => {
          this.CONSUME(Matches)
          return { op: 'MATCHES' as const, value: this.SUBRULE2(this.stringLiteral) }
        },
      },
      {
        ALT: () => {
          this.CONSUME(IsSubset)
          return { op: 'ISSUBSET' as const, value: this.SUBRULE3(this.stringLiteral) }
        },
      },
      {
        ALT: () => {
          this.CONSUME(IsSuperset)
          return { op: 'ISSUPERSET' as const, value: this.SUBRULE4(this.stringLiteral) }
        },
      },
    ]),
  )

  private comparisonOp = this.RULE('comparisonOp', (): ComparisonOp =>
    this.OR<ComparisonOp>([
      {
        ALT: () => {
          this.CONSUME(Equal)
          return '='
        },
      },
      // STIX allows both spellings of inequality
      {
        ALT: () => {
          this.CONSUME(NotEqual)
          return '!='
        },
      },
      {
        ALT: () => {
          this.CONSUME(LessEqual)
          return '<='
        },
      },
      {
        ALT: () => {
          this.CONSUME(GreaterEqual)
          return '>='
        },
      },
      {
        ALT: () => {
          this.CONSUME(Less)
          return '<'
        },
      },
      {
        ALT: () => {
          this.CONSUME(Greater)
          return '>'
        },
      },
    ]),
  )

  private path = this.RULE('path', (): ObjectPathRef => {
    const token = this.CONSUME(ObjectPath)
    return this.ACTION(() => objectPathOf(token))
  })

  private literalSet = this.RULE('literalSet', (): Literal[] => {
    this.CONSUME(LParen)
    const values = [this.SUBRULE(this.literal)]
    this.MANY(() => {
      this.CONSUME(Comma)
      values.push(this.SUBRULE2(this.literal))
    })
    this.CONSUME(RParen)
    return values
  })

  private stringLiteral = this.RULE('stringLiteral', (): Literal => {
    const token = this.CONSUME(StringLiteral)
    return this.ACTION((): Literal => ({ type: 'string', value: unquoteString(token.image) }))
  })

  private literal = this.RULE('literal', (): Literal =>
    this.OR<Literal>([
      { ALT: () => this.SUBRULE(this.stringLiteral) },
      {
        ALT: () => {
          const token = this.CONSUME(IntLiteral)
          return this.ACTION((): Literal => ({ type: 'int', value: token.image }))
        },
      },
      {
        ALT: () => {
          const token = this.CONSUME(FloatLiteral)
          return this.ACTION((): Literal => ({ type: 'float', value: token.image }))
        },
      },
      {
        ALT: () => {
          const token = this.CONSUME(BoolLiteral)
          return this.ACTION((): Literal => ({ type: 'bool', value: token.image === 'true' }))
        },
      },
      {
        ALT: () => {
          const token = this.CONSUME(TimestampLiteral)
          return this.ACTION((): Literal => ({ type: 'timestamp', value: token.image.slice(2, -1) }))
        },
      },
      {
        ALT: () => {
          const token = this.CONSUME(BinaryLiteral)
          return this.ACTION((): Literal => ({ type: 'binary', value: token.image.slice(2, -1) }))
        },
      },
      {
        ALT: () => {
          const token = this.CONSUME(HexLiteral)
          return this.ACTION(
            (): Literal => ({ type: 'binary', value: Buffer.from(token.image.slice(2, -1), 'hex').toString('base64') }),
          )
        },
      },
    ]),
  )
}

// --- Action helpers ---

function combine(kind: 'and' | 'or', operands: PatternNode[]): PatternNode {
  const [first] = operands
  return operands.length === 1 && first !== undefined ? first : { kind, operands }
}

function group(expr: PatternNode): PatternNode {
  return { kind: 'group', expr }
}

function objectPathOf(token: IToken): ObjectPathRef {
  const text = token.image
  const idx = text.indexOf(':')
  return { text, scoType: text.slice(0, idx), prop: text.slice(idx + 1) }
}

/** Strip quotes and undo `\'` and `\\` escapes. */
function unquoteString(image: string): string {
  return image.slice(1, -1).replace(/\\(['\\])/g, '$1')
}

// --- Entry point ---

const parser = new StixPatternParser()

/** Parse a STIX pattern. Throws `PatternSyntaxError` on any lexing or parsing failure. */
export function parsePattern(pattern: string): PatternNode {
  const lexed = StixLexer.tokenize(pattern)
  const [lexError] = lexed.errors
  if (lexError !== undefined) {
    throw new PatternSyntaxError(pattern, lexError.message, lexError.offset)
  }

  parser.input = lexed.tokens
  const ast = parser.pattern()
  const [parseError] = parser.errors
  if (parseError !== undefined) {
    throw new PatternSyntaxError(pattern, parseError.message, parseError.token.startOffset)
  }
  return ast
}
