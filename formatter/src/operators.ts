/**
 * Operator tables for the Elixir formatter
 * Precedences live in data/operators.json.
 */

import { readFileSync } from 'node:fs'

export type Associativity = 'left' | 'right' | 'non_associative'

export interface OperatorInfo {
  associativity: Associativity
  precedence: number
}

/**
 * How a binary operator is laid out
 * - noSpace: `a..b`
 * - noNewline: `a \\ b`, never broken
 * - newlineBeforeLeft: breaks before the operator, e.g. pipes
 * - newlineBeforeRight: breaks before the operator, right associative
 * - flex: breaks after the operator
 */
export type OperatorSpacing =
  | 'noSpace'
  | 'noNewline'
  | 'newlineBeforeLeft'
  | 'newlineBeforeRight'
  | 'flex'

interface OperatorGroup {
  associativity: Associativity
  precedence: number
  operators: string[]
}

interface OperatorTables {
  binary: OperatorGroup[]
  unary: OperatorGroup[]
}

const NO_SPACE_OPERATORS = new Set(['..'])
const NO_NEWLINE_OPERATORS = new Set(['\\\\', 'in'])
const LEFT_NEWLINE_BEFORE_OPERATORS = new Set(['|>', '~>>', '<<~', '~>', '<~', '<~>', '<|>'])
const RIGHT_NEWLINE_BEFORE_OPERATORS = new Set(['|', 'when'])
const LOGICAL_OPERATORS = new Set(['||', '|||', 'or', '&&', '&&&', 'and'])

// Operators whose operands are wrapped in parens when they are themselves operators
const REQUIRED_PARENS_PARENTS = new Set([
  '|>', '<<<', '>>>', '<~', '~>', '<<~', '~>>', '<~>', '<|>', '^^^', 'in', '++', '--', '..', '<>',
])

function isOperatorGroup(value: unknown): value is OperatorGroup {
  if (typeof value !== 'object' || value === null) return false
  if (!('associativity' in value) || !('precedence' in value) || !('operators' in value)) return false
  const { associativity, precedence, operators } = value
  return (
    (associativity === 'left' || associativity === 'right' || associativity === 'non_associative') &&
    typeof precedence === 'number' &&
    Array.isArray(operators) &&
    operators.every((op) => typeof op === 'string')
  )
}

function isOperatorTables(value: unknown): value is OperatorTables {
  if (typeof value !== 'object' || value === null) return false
  if (!('binary' in value) || !('unary' in value)) return false
  const { binary, unary } = value
  return (
    Array.isArray(binary) && binary.every(isOperatorGroup) &&
    Array.isArray(unary) && unary.every(isOperatorGroup)
  )
}

function loadTables(): OperatorTables {
  const raw: unknown = JSON.parse(
    readFileSync(new URL('../data/operators.json', import.meta.url), 'utf8'),
  )
  if (!isOperatorTables(raw)) {
    throw new Error('data/operators.json does not describe operator tables')
  }
  return raw
}

function indexGroups(groups: OperatorGroup[]): Map<string, OperatorInfo> {
  const index = new Map<string, OperatorInfo>()
  for (const { associativity, precedence, operators } of groups) {
    for (const op of operators) {
      index.set(op, { associativity, precedence })
    }
  }
  return index
}

const tables = loadTables()
const binaryIndex = indexGroups(tables.binary)
const unaryIndex = indexGroups(tables.unary)

/**
 * Precedence and associativity of a binary operator
 */
export function binaryOperator(op: string): OperatorInfo | undefined {
  return binaryIndex.get(op)
}

/**
 * Precedence and associativity of a unary operator
 */
export function unaryOperator(op: string): OperatorInfo | undefined {
  return unaryIndex.get(op)
}

export function isBinaryOperator(op: string): boolean {
  return binaryIndex.has(op)
}

export function isUnaryOperator(op: string): boolean {
  return unaryIndex.has(op)
}

export function operatorSpacing(op: string): OperatorSpacing {
  if (NO_SPACE_OPERATORS.has(op)) return 'noSpace'
  if (NO_NEWLINE_OPERATORS.has(op)) return 'noNewline'
  if (LEFT_NEWLINE_BEFORE_OPERATORS.has(op)) return 'newlineBeforeLeft'
  if (RIGHT_NEWLINE_BEFORE_OPERATORS.has(op)) return 'newlineBeforeRight'
  return 'flex'
}

function isLogicalOperator(op: string): boolean {
  return LOGICAL_OPERATORS.has(op)
}

export function sameOperatorInfo(
  left: OperatorInfo | null,
  right: OperatorInfo | null,
): boolean {
  if (left === null || right === null) return left === right
  return left.associativity === right.associativity && left.precedence === right.precedence
}

export type OperandSide = 'left' | 'right'

/**
 * What to do with a binary operand that is itself a binary operator
 * - sameNesting: lay it out flat with the parent, e.g. `a + b + c`
 * - parens: wrap it, e.g. `(a + b) * c`
 * - nest: lay it out on its own, nested
 */
export type OperandLayout = 'sameNesting' | 'parens' | 'nest'

export function resolveOperandLayout(
  parentOp: string,
  parent: OperatorInfo,
  op: string,
  info: OperatorInfo,
  side: OperandSide,
): OperandLayout {
  if (parent.precedence === info.precedence && parent.associativity === side) {
    return 'sameNesting'
  }
  if (
    (REQUIRED_PARENS_PARENTS.has(parentOp) && op !== '..') ||
    (isLogicalOperator(parentOp) && isLogicalOperator(op)) ||
    parent.precedence > info.precedence ||
    (parent.precedence === info.precedence && parent.associativity !== side)
  ) {
    return 'parens'
  }
  return 'nest'
}
