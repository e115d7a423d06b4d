import { createToken, Lexer } from 'chevrotain'
import type { TokenType } from 'chevrotain'

// ── Tokens ─────────────────────────────────────────────────────

export const WhiteSpace = createToken({ name: 'WhiteSpace', pattern: /\s+/, group: Lexer.SKIPPED })

/** `type:prop`, where prop segments are words or `'quoted'` keys, each optionally `[*]` or `[n]` */
export const ObjectPath = createToken({
  name: 'ObjectPath',
  pattern: /[a-z0-9][a-z0-9-]*:(?:[\w-]+|'[^']+')(?:\[(?:\*|\d+)\])?(?:\.(?:[\w-]+|'[^']+')(?:\[(?:\*|\d+)\])?)*/,
})

// Literals; the prefixed forms must be tried before plain identifiers and booleans
export const TimestampLiteral = createToken({ name: 'TimestampLiteral', pattern: /t'[^']*'/ })
export const BinaryLiteral = createToken({ name: 'BinaryLiteral', pattern: /b'[A-Za-z0-9+/=]*'/ })
export const HexLiteral = createToken({ name: 'HexLiteral', pattern: /h'(?:[0-9a-fA-F]{2})*'/ })
export const StringLiteral = createToken({ name: 'StringLiteral', pattern: /'(?:\\['\\]|[^'\\])*'/ })
export const FloatLiteral = createToken({ name: 'FloatLiteral', pattern: /[+-]?(?:\d+\.\d*|\.\d+)(?:[eE][+-]?\d+)?/ })
export const IntLiteral = createToken({ name: 'IntLiteral', pattern: /[+-]?\d+/ })
export const BoolLiteral = createToken({ name: 'BoolLiteral', pattern: /(?:true|false)\b/ })

// Keywords
export const And = createToken({ name: 'And', pattern: /AND\b/ })
export const Or = createToken({ name: 'Or', pattern: /OR\b/ })
export const Not = createToken({ name: 'Not', pattern: /NOT\b/ })
export const FollowedBy = createToken({ name: 'FollowedBy', pattern: /FOLLOWEDBY\b/ })
export const Exists = createToken({ name: 'Exists', pattern: /EXISTS\b/ })
export const IsSubset = createToken({ name: 'IsSubset', pattern: /ISSUBSET\b/ })
export const IsSuperset = createToken({ name: 'IsSuperset', pattern: /ISSUPERSET\b/ })
export const In = createToken({ name: 'In', pattern: /IN\b/ })
export const Like = createToken({ name: 'Like', pattern: /LIKE\b/ })
export const Matches = createToken({ name: 'Matches', pattern: /MATCHES\b/ })
export const Within = createToken({ name: 'Within', pattern: /WITHIN\b/ })
export const Seconds = createToken({ name: 'Seconds', pattern: /SECONDS\b/ })
export const Repeats = createToken({ name: 'Repeats', pattern: /REPEATS\b/ })
export const Times = createToken({ name: 'Times', pattern: /TIMES\b/ })
export const Start = createToken({ name: 'Start', pattern: /START\b/ })
export const Stop = createToken({ name: 'Stop', pattern: /STOP\b/ })

// Comparison operators, longest first
export const NotEqual = createToken({ name: 'NotEqual', pattern: /!=|<>/ })
export const LessEqual = createToken({ name: 'LessEqual', pattern: /<=/ })
export const GreaterEqual = createToken({ name: 'GreaterEqual', pattern: />=/ })
export const Less = createToken({ name: 'Less', pattern: /</ })
export const Greater = createToken({ name: 'Greater', pattern: />/ })
export const Equal = createToken({ name: 'Equal', pattern: /=/ })

// Punctuation
export const LBracket = createToken({ name: 'LBracket', pattern: /\[/ })
export const RBracket = createToken({ name: 'RBracket', pattern: /]/ })
export const LParen = createToken({ name: 'LParen', pattern: /\(/ })
export const RParen = createToken({ name: 'RParen', pattern: /\)/ })
export const Comma = createToken({ name: 'Comma', pattern: /,/ })

export const allTokens: TokenType[] = [
  WhiteSpace,
  ObjectPath,
  TimestampLiteral,
  BinaryLiteral,
  HexLiteral,
  StringLiteral,
  FloatLiteral,
  IntLiteral,
  BoolLiteral,
  FollowedBy,
  And,
  Or,
  Not,
  Exists,
  IsSubset,
  IsSuperset,
  In,
  Like,
  Matches,
  Within,
  Seconds,
  Repeats,
  Times,
  Start,
  Stop,
  NotEqual,
  LessEqual,
  GreaterEqual,
  Less,
  Greater,
  Equal,
  LBracket,
  RBracket,
  LParen,
  RParen,
  Comma,
]

export const StixLexer = new Lexer(allTokens, { ensureOptimizations: false, positionTracking: 'onlyOffset' })
