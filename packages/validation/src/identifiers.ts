import { InvalidIdentifierError, InvalidPathError } from './errors.js'

// --- Grammars ---

/** Table, view, column-alias and join-alias names. The empty string is accepted. */
const NAME_REGEX = /^[\w-]*$/

/**
 * STIX object path or property name: optional `type:` prefix, then dot-separated
 * segments of word, hyphen or quote characters, each optionally followed by a
 * `[*]` list marker.
 */
const PATH_REGEX = /^(?:[a-zA-Z][a-zA-Z0-9-]*:)?[\w'-]+(?:\[\*\])?(?:\.[\w'-]+(?:\[\*\])?)*$/

// --- Predicates ---

export function isValidName(name: string): boolean {
  return NAME_REGEX.test(name)
}

export function isValidPath(path: string): boolean {
  return PATH_REGEX.test(path)
}

// --- Validators ---

/**
 * Throws `InvalidIdentifierError` unless `name` is safe to place inside a quoted SQL identifier.
 * Must run before any caller-supplied name is concatenated into SQL text.
 */
export function validateName(name: string): void {
  if (typeof name !== 'string' || !isValidName(name)) {
    throw new InvalidIdentifierError(String(name))
  }
}

/** Throws `InvalidPathError` unless `path` is a well-formed STIX object path or property. */
export function validatePath(path: string): void {
  if (typeof path !== 'string' || !isValidPath(path)) {
    throw new InvalidPathError(String(path))
  }
}
