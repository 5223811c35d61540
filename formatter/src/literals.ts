/**
 * Literal rendering for the Elixir formatter
 * Numbers, atoms, strings and heredocs
 */

import type { Doc } from 'prettier'
import { join, lines, newline, resetLine } from './algebra.js'
import { FormatterInvariantError } from './errors.js'
import { isBinaryOperator, isUnaryOperator } from './operators.js'

// ===========================================
// Numbers
// ===========================================

/**
 * Group decimal digits by three from the right, once there are six or more
 */
export function insertUnderscores(digits: string): string {
  const plain = digits.replaceAll('_', '')
  if (plain.length < 6) return digits

  const groups: string[] = []
  for (let end = plain.length; end > 0; end -= 3) {
    groups.unshift(plain.slice(Math.max(0, end - 3), end))
  }
  return groups.join('_')
}

export function integerToAlgebra(original: string): string {
  if (original.startsWith('0x')) {
    return '0x' + original.slice(2).toUpperCase()
  }
  if (original.startsWith('0b') || original.startsWith('0o') || original.startsWith('?')) {
    return original
  }
  return insertUnderscores(original)
}

export function floatToAlgebra(original: string): string {
  const dot = original.indexOf('.')
  if (dot === -1) {
    throw new FormatterInvariantError(`float literal without a decimal point: ${original}`)
  }
  return insertUnderscores(original.slice(0, dot)) + '.' + original.slice(dot + 1).toLowerCase()
}

// ===========================================
// Atoms and identifiers
// ===========================================

export type AtomClass = 'callable_local' | 'callable_operator' | 'not_callable' | 'alias' | 'other'

const NOT_CALLABLE_ATOMS = new Set(['%', '%{}', '{}', '<<>>', '...', '..', '.', '->'])

const CALLABLE_LOCAL = /^[\p{Ll}_][\p{L}\p{N}_]*[?!]?$/u
// Identifiers that are valid atoms but cannot be called, e.g. `Foo` or `node@host`
const BARE_IDENTIFIER = /^[\p{L}_][\p{L}\p{N}_@]*[?!]?$/u
const ALIAS = /^Elixir(\.[A-Z][\p{L}\p{N}_]*)+$/u

export function classify(atom: string): AtomClass {
  if (NOT_CALLABLE_ATOMS.has(atom)) return 'not_callable'
  if (atom === '::') return 'other'
  if (isUnaryOperator(atom) || isBinaryOperator(atom)) return 'callable_operator'
  if (ALIAS.test(atom)) return 'alias'
  if (CALLABLE_LOCAL.test(atom)) return 'callable_local'
  if (BARE_IDENTIFIER.test(atom)) return 'not_callable'
  return 'other'
}

function quote(text: string): string {
  return '"' + text.replaceAll('"', '\\"') + '"'
}

export function atomToAlgebra(atom: string): string {
  if (atom === 'nil' || atom === 'true' || atom === 'false') return atom

  switch (classify(atom)) {
    case 'callable_local':
    case 'callable_operator':
    case 'not_callable':
      return ':' + atom
    default:
      return ':' + quote(atom)
  }
}

/**
 * Keyword key with its trailing colon and space, e.g. `foo: ` or `"foo bar": `
 */
export function inspectAsKey(atom: string): string {
  return (BARE_IDENTIFIER.test(atom) ? atom : quote(atom)) + ': '
}

/**
 * Function name as written after `Mod.`
 */
export function inspectAsFunction(atom: string): string {
  const kind = classify(atom)
  return kind === 'callable_local' || kind === 'callable_operator' ? atom : quote(atom)
}

// ===========================================
// Strings
// ===========================================

/**
 * Escape the delimiter and keep the string's own newlines at column 0
 */
export function escapeString(value: string, delimiter: string): Doc {
  const escaped = value.replaceAll(delimiter, '\\' + delimiter)
  return join(resetLine, escaped.split('\n'))
}

/**
 * Heredoc body: lines follow the enclosing indentation, blank lines stay empty
 */
export function escapeHeredoc(value: string): Doc {
  return heredocToAlgebra(value.split('\n'))
}

function heredocToAlgebra(parts: string[]): Doc {
  const [first, ...rest] = parts
  if (rest.length === 0) return first
  if (rest.length === 1 && rest[0] === '') return [first, newline]
  if (rest[0] === '') return lines([first, resetLine], heredocToAlgebra(rest.slice(1)))
  return lines(first, heredocToAlgebra(rest))
}

// ===========================================
// Sigils
// ===========================================

const CLOSING_SIGIL_TERMINATORS = new Map([
  ['(', ')'],
  ['[', ']'],
  ['{', '}'],
  ['<', '>'],
  ['"', '"'],
  ["'", "'"],
  ['|', '|'],
  ['/', '/'],
])

export function closingSigilTerminator(opening: string): string {
  const closing = CLOSING_SIGIL_TERMINATORS.get(opening)
  if (closing === undefined) {
    throw new FormatterInvariantError(`unknown sigil delimiter ${JSON.stringify(opening)}`)
  }
  return closing
}
