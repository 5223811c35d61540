/**
 * Prettier doc builder for quoted Elixir forms
 * Handles every form the parser produces with formatter metadata
 */

import type { Doc } from 'prettier'
import {
  breakParent,
  conditionalGroup,
  empty,
  flatWidth,
  forceBreak,
  formatToString,
  glue,
  group,
  hasForcedBreak,
  ifBreak,
  isEmpty,
  join,
  line,
  lines,
  maybeEmptyLine,
  nest,
  nestWhenBroken,
  newline,
  space,
  surround,
  withNextBreakFits,
  wrapInParens,
} from './algebra.js'
import { quotedToAlgebraWithComments } from './comments.js'
import { FormatterInvariantError } from './errors.js'
import {
  atomToAlgebra,
  classify,
  closingSigilTerminator,
  escapeHeredoc,
  escapeString,
  floatToAlgebra,
  inspectAsFunction,
  inspectAsKey,
  integerToAlgebra,
} from './literals.js'
import type { OperandSide, OperatorInfo } from './operators.js'
import {
  binaryOperator,
  isBinaryOperator,
  isUnaryOperator,
  operatorSpacing,
  resolveOperandLayout,
  sameOperatorInfo,
  unaryOperator,
} from './operators.js'
import type { CallNode, Meta, PairNode, Quoted } from './parser.js'
import {
  blockValue,
  endLineOf,
  isCallTo,
  isModuleAtom,
  lineOf,
  MAX_LINE,
  metaOf,
  MIN_LINE,
} from './parser.js'
import type { FormatState } from './state.js'
import { matchesRequirement, skipsParens } from './state.js'

/**
 * Where an expression appears, which decides whether calls may drop parens
 */
export type Context =
  | 'block'
  | 'operand'
  | 'parensArg'
  | 'noParensArg'
  | 'parensOneArg'
  | 'noParensOneArg'

/**
 * Clause arguments on the left of `when`, laid out as a single operand
 */
export interface ClauseArgs {
  type: 'clauseArgs'
  args: Quoted[]
  minLine: number
}

export type Operand = Quoted | ClauseArgs

type ParensMode = 'skipUnlessManyArgs' | 'skipIfDoEnd' | 'required'

interface CallArgs {
  doc: Doc
  wrapInParens: boolean
}

const DOUBLE_HEREDOC = '"""'
const SINGLE_HEREDOC = "'''"

function forceManyArgsOrOperand(context: Context, choice: Context): Context {
  switch (context) {
    case 'noParensOneArg':
    case 'noParensArg':
      return 'noParensArg'
    case 'parensOneArg':
    case 'parensArg':
      return 'parensArg'
    default:
      return choice
  }
}

// ===========================================
// Dispatch
// ===========================================

export function quotedToAlgebra(node: Operand, context: Context, state: FormatState): Doc {
  switch (node.type) {
    case 'clauseArgs':
      return group(clauseArgsToAlgebra(node.args, node.minLine, state))
    case 'var':
      return node.name
    case 'call':
      return callToAlgebra(node, context, state)
    case 'list':
      // (left -> right)
      if (startsWithClause(node.items)) {
        return typeFunToAlgebra(node.items, MAX_LINE, MIN_LINE, state)
      }
      // keyword lists and map entries without their brackets
      return argsToAlgebra(node.items, (arg) => quotedToAlgebra(arg, context, state))
    case 'pair':
      return pairToAlgebra(node, context, state)
    case 'atom':
      return atomToAlgebra(node.value)
    case 'integer':
    case 'float':
      return String(node.value)
    case 'string':
      return ['"', escapeString(node.value, '"'), '"']
    default: {
      const unknown: never = node
      throw new FormatterInvariantError(`unknown node ${JSON.stringify(unknown)}`)
    }
  }
}

function callToAlgebra(node: CallNode, context: Context, state: FormatState): Doc {
  const { callee, meta, args } = node
  if (typeof callee !== 'string') {
    return remoteCallToAlgebra(node, callee, context, state)
  }

  switch (callee) {
    case '<<>>':
      return binaryLiteralToAlgebra(meta, args, state)
    case '%': {
      // %Struct{} and %name{key | value}
      const [name, map] = args
      if (args.length === 2 && isCallTo(map, '%{}')) {
        const nameDoc = quotedToAlgebra(name, 'parensArg', state)
        return mapToAlgebra(map.meta, nameDoc, map.args, state)
      }
      break
    }
    case '%{}':
      return mapToAlgebra(meta, empty, args, state)
    case '{}':
      return tupleToAlgebra(meta, args, state)
    case '__block__':
      return blockCallToAlgebra(node, context, state)
    case '__aliases__':
      return aliasesToAlgebra(args, context, state)
    case '&':
      if (args.length === 1) return captureToAlgebra(args[0], context, state)
      break
    case '@':
      if (args.length === 1) return moduleAttributeToAlgebra(args[0], context, state)
      break
    case 'not': {
      // left not in right
      const [inner] = args
      if (args.length === 1 && isCallTo(inner, 'in') && inner.args.length === 2) {
        const [left, right] = inner.args
        return binaryOpToAlgebra('in', 'not in', meta, left, right, context, state)
      }
      break
    }
    case 'fn':
      if (args.length > 0) return anonFunToAlgebra(args, lineOf(meta), endLineOf(meta), state)
      break
  }

  const sigil = sigilToAlgebra(callee, meta, args, state)
  if (sigil !== undefined) return sigil

  if (args.length === 1 && isUnaryOperator(callee)) {
    return unaryOpToAlgebra(callee, args[0], context, state)
  }
  if (args.length === 2 && isBinaryOperator(callee)) {
    return binaryOpToAlgebra(callee, callee, meta, args[0], args[1], context, state)
  }
  return localToAlgebra(callee, args, context, state)
}

function blockCallToAlgebra(node: CallNode, context: Context, state: FormatState): Doc {
  const { meta, args } = node
  if (args.length !== 1) {
    const block = blockToAlgebra(node, lineOf(meta), endLineOf(meta), state)
    return surround('(', block, ')')
  }

  const [value] = args
  switch (value.type) {
    case 'pair':
      return tupleToAlgebra(meta, [value.left, value.right], state)
    case 'list':
      return listLiteralToAlgebra(meta, value.items, state)
    case 'string':
      if (meta.format === 'binHeredoc') {
        return forceBreak([lines(DOUBLE_HEREDOC, escapeHeredoc(value.value)), DOUBLE_HEREDOC])
      }
      return ['"', escapeString(value.value, '"'), '"']
    case 'atom':
      return atomToAlgebra(value.value)
    case 'integer':
      return integerToAlgebra(originalOf(meta, value.value))
    case 'float':
      return floatToAlgebra(originalOf(meta, value.value))
    default:
      break
  }

  if (isCallTo(value, 'unquote_splicing') && value.args.length === 1) {
    return wrapInParens(localToAlgebra('unquote_splicing', value.args, context, state))
  }
  return quotedToAlgebra(value, context, state)
}

function originalOf(meta: Meta, value: bigint | number): string {
  if (meta.original === undefined) {
    throw new FormatterInvariantError(`number literal ${value} has no original source text`)
  }
  return meta.original
}

function listLiteralToAlgebra(meta: Meta, items: Quoted[], state: FormatState): Doc {
  switch (meta.format) {
    case 'listHeredoc':
      return forceBreak([lines(SINGLE_HEREDOC, escapeHeredoc(charlistToString(items))), SINGLE_HEREDOC])
    case 'charlist':
      return ["'", escapeString(charlistToString(items), "'"), "'"]
    default:
      return listToAlgebra(meta, items, state)
  }
}

function charlistToString(items: Quoted[]): string {
  return items
    .map((item) => {
      if (item.type !== 'integer') {
        throw new FormatterInvariantError('charlist contains a non-integer element')
      }
      return String.fromCodePoint(Number(item.value))
    })
    .join('')
}

function aliasesToAlgebra(args: Quoted[], context: Context, state: FormatState): Doc {
  const [head, ...tail] = args
  if (head === undefined) {
    throw new FormatterInvariantError('alias without segments')
  }
  const headDoc =
    head.type === 'atom' ? head.value : quotedToAlgebraWithParensIfNecessary(head, context, state)
  const segments = tail.map((segment) => {
    if (segment.type !== 'atom') {
      throw new FormatterInvariantError('alias segment is not an atom')
    }
    return '.' + segment.value
  })
  return [headDoc, ...segments]
}

function pairToAlgebra(node: PairNode, context: Context, state: FormatState): Doc {
  const { left, right } = node
  if (!isKeywordKey(left)) {
    return [quotedToAlgebra(left, context, state), ' => ', quotedToAlgebra(right, context, state)]
  }

  const key = blockValue(left)
  let keyDoc: Doc
  if (key !== undefined) {
    if (key.type !== 'atom') {
      throw new FormatterInvariantError('keyword key is not an atom')
    }
    keyDoc = inspectAsKey(key.value)
  } else {
    // "interpolated #{key}": value
    keyDoc = interpolationToAlgebra(interpolatedAtomEntries(left) ?? [], '"', state, '"', '": ')
  }
  return [keyDoc, quotedToAlgebra(right, context, state)]
}

// ===========================================
// Blocks
// ===========================================

/**
 * Statements of a block, one per line, with comments placed between them
 */
export function blockToAlgebra(
  node: Quoted,
  minLine: number,
  maxLine: number,
  state: FormatState,
): Doc {
  if (node.type === 'list' && startsWithClause(node.items)) {
    return typeFunToAlgebra(node.items, minLine, maxLine, state)
  }
  if (isCallTo(node, '__block__') && node.args.length !== 1) {
    return blockArgsToAlgebra(node.args, minLine, maxLine, state)
  }
  return blockArgsToAlgebra([node], minLine, maxLine, state)
}

function blockArgsToAlgebra(
  args: Quoted[],
  minLine: number,
  maxLine: number,
  state: FormatState,
): Doc {
  const docs = quotedToAlgebraWithComments(args, minLine, maxLine, 2, state, (arg, _index, newlines) => ({
    doc: quotedToAlgebra(arg, 'block', state),
    // module attributes stay packed together
    nextLine: isCallTo(arg, '@') ? 'none' : 'flex',
    newlines: metaOf(arg).newlines ?? newlines,
  }))

  if (docs.length === 0) return empty
  if (docs.length === 1) return docs[0]
  return forceBreak(join(newline, docs))
}

// ===========================================
// Operators
// ===========================================

function unaryOpToAlgebra(op: string, arg: Quoted, context: Context, state: FormatState): Doc {
  const doc = quotedToAlgebra(arg, forceManyArgsOrOperand(context, 'operand'), state)

  // `!` and `not` nest without parens
  const nestable = (op === '!' || op === 'not') && isCallTo(arg, op) && arg.args.length === 1
  if (!nestable && needsParens(arg)) {
    return [op, wrapInParens(doc)]
  }
  return [op === 'not' ? 'not ' : op, doc]
}

function binaryOpToAlgebra(
  op: string,
  opString: string,
  meta: Meta,
  leftArg: Operand,
  rightArg: Quoted,
  context: Context,
  state: FormatState,
  parentInfo: OperatorInfo | null = null,
  nesting: number = state.operandNesting,
): Doc {
  const info = binaryOperator(op)
  if (info === undefined) {
    throw new FormatterInvariantError(`${op} is not a binary operator`)
  }

  const leftContext = forceManyArgsOrOperand(context, 'parensArg')
  const rightContext = forceManyArgsOrOperand(context, 'operand')
  const left = binaryOperandToAlgebra(leftArg, leftContext, state, op, info, 'left', 2)
  const right = binaryOperandToAlgebra(rightArg, rightContext, state, op, info, 'right', 0)

  switch (operatorSpacing(op)) {
    case 'noSpace':
      return [left, opString, right]

    case 'noNewline':
      return [left, ` ${opString} `, right]

    case 'newlineBeforeLeft': {
      const prefix = opString + ' '
      let doc = glue(left, [prefix, nest(right, prefix.length)])
      if (meta.eol === true) doc = forceBreak(doc)
      return sameOperatorInfo(info, parentInfo) ? doc : group(doc)
    }

    case 'newlineBeforeRight': {
      const prefix = opString + ' '
      // a chain of the same operator nests its left side once
      const leftDoc = sameOperatorInfo(info, parentInfo) ? nest(left, prefix.length) : left
      const rightDoc =
        isCallTo(rightArg, op) && rightArg.args.length === 2 ? right : nest(right, prefix.length)
      const doc = glue(leftDoc, [prefix, rightDoc])
      return parentInfo === null || sameOperatorInfo(info, parentInfo) ? doc : group(doc)
    }

    case 'flex':
      return withNextBreakFits(nextBreakFits(rightArg), right, (rightDoc) => [
        left,
        group(nestWhenBroken(glue(' ' + opString, group(rightDoc)), nesting)),
      ])
  }
}

function binaryOperandToAlgebra(
  operand: Operand,
  context: Context,
  state: FormatState,
  parentOp: string,
  parentInfo: OperatorInfo,
  side: OperandSide,
  nesting: number,
): Doc {
  if (operand.type !== 'call') {
    return quotedToAlgebra(operand, context, state)
  }

  // (not left) in right
  const negated = blockValue(operand)
  if (
    parentOp === 'in' &&
    side === 'left' &&
    negated !== undefined &&
    (isCallTo(negated, 'not') || isCallTo(negated, '!')) &&
    negated.args.length === 1 &&
    typeof negated.callee === 'string'
  ) {
    return wrapInParens(unaryOpToAlgebra(negated.callee, negated.args[0], context, state))
  }

  const { callee, meta, args } = operand
  const info = typeof callee === 'string' && args.length === 2 ? binaryOperator(callee) : undefined
  if (typeof callee === 'string' && info !== undefined) {
    const [left, right] = args
    switch (resolveOperandLayout(parentOp, parentInfo, callee, info, side)) {
      case 'sameNesting':
        return binaryOpToAlgebra(callee, callee, meta, left, right, context, state, info, nesting)
      case 'parens':
        return wrapInParens(binaryOpToAlgebra(callee, callee, meta, left, right, context, state, info, 2))
      case 'nest':
        return binaryOpToAlgebra(callee, callee, meta, left, right, context, state, info, 2)
    }
  }

  const [captured] = args
  if (callee === '&' && args.length === 1 && captured.type !== 'integer') {
    const doc = quotedToAlgebra(operand, context, state)
    const capture = unaryOperator('&')
    return capture !== undefined && parentInfo.precedence < capture.precedence
      ? doc
      : wrapInParens(doc)
  }

  return quotedToAlgebra(operand, context, state)
}

function isOperator(node: Quoted): boolean {
  if (node.type !== 'call' || typeof node.callee !== 'string') return false
  return (
    (node.args.length === 1 && isUnaryOperator(node.callee)) ||
    (node.args.length === 2 && isBinaryOperator(node.callee))
  )
}

function needsParens(node: Quoted): boolean {
  const value = blockValue(node)
  if (value !== undefined) return needsParens(value)
  return isOperator(node) && !isModuleAttributeRead(node) && !isIntegerCapture(node)
}

function isModuleAttributeRead(node: Quoted): boolean {
  if (!isCallTo(node, '@') || node.args.length !== 1) return false
  const [name] = node.args
  return name.type === 'var' && classify(name.name) === 'callable_local'
}

function isIntegerCapture(node: Quoted): boolean {
  return isCallTo(node, '&') && node.args.length === 1 && node.args[0].type === 'integer'
}

function quotedToAlgebraWithParensIfNecessary(
  node: Quoted,
  context: Context,
  state: FormatState,
): Doc {
  const doc = quotedToAlgebra(node, context, state)
  return needsParens(node) ? wrapInParens(doc) : doc
}

// ===========================================
// Module attributes and captures
// ===========================================

function moduleAttributeToAlgebra(arg: Quoted, context: Context, state: FormatState): Doc {
  // @(Foo.Bar)
  if (isCallTo(arg, '__aliases__') && arg.args.length >= 2) {
    return ['@(', quotedToAlgebra(arg, 'parensArg', state), ')']
  }

  // @name value
  if (
    arg.type === 'call' &&
    typeof arg.callee === 'string' &&
    arg.callee !== '__block__' &&
    arg.callee !== '__aliases__' &&
    arg.args.length === 1 &&
    classify(arg.callee) === 'callable_local'
  ) {
    const head = '@' + arg.callee
    const call = callArgsToAlgebra(arg.args, context, 'skipUnlessManyArgs', false, head, state)
    const doc = [head, call.doc]
    return call.wrapInParens ? wrapInParens(doc) : doc
  }

  return unaryOpToAlgebra('@', arg, context, state)
}

function captureToAlgebra(arg: Quoted, context: Context, state: FormatState): Doc {
  // &1
  if (arg.type === 'integer') return '&' + String(arg.value)

  const doc = captureTargetToAlgebra(arg, context, state)
  // & &1
  return formatToString(doc).startsWith('&') ? ['& ', doc] : ['&', doc]
}

function captureTargetToAlgebra(arg: Quoted, context: Context, state: FormatState): Doc {
  if (isCallTo(arg, '/') && arg.args.length === 2) {
    const [target, arityNode] = arg.args
    const arity = blockValue(arityNode)

    if (arity !== undefined && arity.type === 'integer') {
      // &Mod.fun/1
      const remote = target.type === 'call' ? dotCall(target.callee) : undefined
      if (target.type === 'call' && target.args.length === 0 && remote?.fun !== undefined) {
        const targetDoc = remoteTargetToAlgebra(remote.target, state)
        const fun = remoteFunToAlgebra(remote.target, remote.fun, Number(arity.value), state)
        return [nest(targetDoc, 1), `.${fun}/${arity.value}`]
      }

      // &fun/1
      if (target.type === 'var') {
        return `${target.name}/${arity.value}`
      }
    }
  }

  const doc = quotedToAlgebra(arg, context, state)
  if (
    arg.type === 'call' &&
    typeof arg.callee === 'string' &&
    arg.args.length === 2 &&
    isBinaryOperator(arg.callee)
  ) {
    return wrapInParens(doc)
  }
  return doc
}

// ===========================================
// Calls
// ===========================================

interface DotCall {
  target: Quoted
  /** Undefined for anonymous calls, `fun.(args)` */
  fun: string | undefined
}

function dotCall(callee: string | Quoted): DotCall | undefined {
  if (typeof callee === 'string' || !isCallTo(callee, '.')) return undefined
  const [target, fun] = callee.args
  if (callee.args.length === 1) return { target, fun: undefined }
  if (callee.args.length === 2 && fun.type === 'atom') return { target, fun: fun.value }
  return undefined
}

function remoteCallToAlgebra(
  node: CallNode,
  callee: Quoted,
  context: Context,
  state: FormatState,
): Doc {
  const { meta, args } = node
  const dot = dotCall(callee)

  // call(a)(b)
  if (dot === undefined) {
    const targetDoc = quotedToAlgebra(callee, 'noParensArg', state)
    const call = callArgsToAlgebra(args, context, 'required', true, targetDoc, state)
    const doc = [targetDoc, call.doc]
    return call.wrapInParens ? wrapInParens(doc) : doc
  }

  const { target, fun } = dot
  const [first, second] = args

  // 'charlist #{interpolation}'
  if (
    fun === 'to_charlist' &&
    isModuleAtom(target, 'String') &&
    args.length === 1 &&
    isCallTo(first, '<<>>') &&
    isInterpolated(first.args)
  ) {
    if (first.meta.format === 'listHeredoc') {
      const initial = forceBreak([SINGLE_HEREDOC, newline])
      return interpolationToAlgebra(first.args, null, state, initial, SINGLE_HEREDOC)
    }
    return interpolationToAlgebra(first.args, "'", state, "'", "'")
  }

  // :"atom #{interpolation}"
  if (
    fun === 'binary_to_atom' &&
    target.type === 'atom' &&
    target.value === 'erlang' &&
    args.length === 2 &&
    isCallTo(first, '<<>>') &&
    second.type === 'atom' &&
    second.value === 'utf8' &&
    isInterpolated(first.args)
  ) {
    return interpolationToAlgebra(first.args, '"', state, ':"', '"')
  }

  // target[key]
  if (fun === 'get' && isModuleAtom(target, 'Access') && args.length >= 1) {
    const targetDoc = remoteTargetToAlgebra(first, state)
    return [targetDoc, listToAlgebra(meta, args.slice(1), state)]
  }

  const targetDoc = remoteTargetToAlgebra(target, state)

  // Mod.{A, B}
  if (fun === '{}') {
    return [targetDoc, '.', tupleToAlgebra({}, args, state)]
  }

  // fun.(args)
  if (fun === undefined) {
    const head = [targetDoc, '.']
    const call = callArgsToAlgebra(args, context, 'skipIfDoEnd', true, head, state)
    const doc = [...head, call.doc]
    return call.wrapInParens ? wrapInParens(doc) : doc
  }

  const funDoc = remoteFunToAlgebra(target, fun, args.length, state)

  // Mod.fun() and var.field
  if (args.length === 0) {
    return isModuleTarget(target) ? [targetDoc, '.', funDoc, '()'] : [targetDoc, '.', funDoc]
  }

  const head = [targetDoc, '.', funDoc]
  const call = callArgsToAlgebra(args, context, 'skipIfDoEnd', true, head, state)
  const doc = [...head, call.doc]
  return call.wrapInParens ? wrapInParens(doc) : doc
}

function isModuleTarget(target: Quoted): boolean {
  const value = blockValue(target)
  return (
    (target.type === 'var' && target.name === '__MODULE__') ||
    (value !== undefined && value.type === 'atom') ||
    isCallTo(target, '__aliases__')
  )
}

function remoteTargetToAlgebra(target: Quoted, state: FormatState): Doc {
  if (isCallTo(target, 'fn') && target.args.length > 0) {
    return wrapInParens(quotedToAlgebra(target, 'noParensArg', state))
  }
  return quotedToAlgebraWithParensIfNecessary(target, 'noParensArg', state)
}

interface DeprecatedFunction {
  module: string
  fun: string
  arity: number
  replacement: string
  requirement: string
}

// Only renames within the same module; a new module could clash with aliases
const DEPRECATED_FUNCTIONS: DeprecatedFunction[] = [
  { module: 'Enum', fun: 'partition', arity: 2, replacement: 'split_with', requirement: '~> 1.4' },
]

function targetModuleName(target: Quoted): string | undefined {
  if (isCallTo(target, '__aliases__') && target.args[0]?.type === 'atom') {
    return target.args.map((segment) => (segment.type === 'atom' ? segment.value : '')).join('.')
  }
  const value = blockValue(target)
  if (value !== undefined && value.type === 'atom') {
    return value.value.replace(/^Elixir\./, '')
  }
  return undefined
}

function remoteFunToAlgebra(target: Quoted, fun: string, arity: number, state: FormatState): string {
  const since = state.renameDeprecatedAt
  if (since !== null) {
    const moduleName = targetModuleName(target)
    const deprecated = DEPRECATED_FUNCTIONS.find(
      (entry) => entry.module === moduleName && entry.fun === fun && entry.arity === arity,
    )
    if (deprecated !== undefined && matchesRequirement(since, deprecated.requirement)) {
      return deprecated.replacement
    }
  }
  return inspectAsFunction(fun)
}

function localToAlgebra(fun: string, args: Quoted[], context: Context, state: FormatState): Doc {
  const parens: ParensMode = skipsParens(state, fun, args.length) ? 'skipUnlessManyArgs' : 'skipIfDoEnd'
  const call = callArgsToAlgebra(args, context, parens, true, fun, state)
  const doc = [fun, call.doc]
  return call.wrapInParens ? wrapInParens(doc) : doc
}

/**
 * Arguments of a call, with or without parens, and its do/end blocks
 * @param head What precedes the arguments on the line, used to align them
 */
function callArgsToAlgebra(
  args: Quoted[],
  context: Context,
  parens: ParensMode,
  listToKeyword: boolean,
  head: Doc,
  state: FormatState,
): CallArgs {
  if (args.length === 0) return { doc: '()', wrapInParens: false }

  const rest = args.slice(0, -1)
  const last = args[args.length - 1]
  const blocks = doEndBlocks(last)

  if (blocks !== undefined) {
    let callDoc: Doc = empty
    if (rest.length > 0) {
      callDoc = callArgsWithoutBlocksToAlgebra(
        rest.slice(0, -1),
        rest[rest.length - 1],
        parens !== 'required',
        listToKeyword,
        head,
        state,
      )
    }
    const blocksDoc = doEndBlocksToAlgebra(blocks, state)
    return {
      doc: forceBreak(lines(space(callDoc, blocksDoc), 'end')),
      wrapInParens: context === 'noParensArg' || context === 'noParensOneArg',
    }
  }

  const skipParens =
    parens === 'skipUnlessManyArgs' &&
    (context === 'block' ||
      context === 'operand' ||
      context === 'noParensOneArg' ||
      context === 'parensOneArg')

  return {
    doc: callArgsWithoutBlocksToAlgebra(rest, last, skipParens, listToKeyword, head, state),
    wrapInParens: false,
  }
}

function callArgsWithoutBlocksToAlgebra(
  left: Quoted[],
  right: Quoted,
  skipParens: boolean,
  listToKeyword: boolean,
  head: Doc,
  state: FormatState,
): Doc {
  const multipleGenerators =
    [right, ...left].filter((arg) => isCallTo(arg, '<-') && arg.args.length === 2).length >= 2
  const keywords = lastArgToKeyword(right, listToKeyword)

  let context: Context
  if (left.length === 0 && keywords === undefined) {
    context = skipParens ? 'noParensOneArg' : 'parensOneArg'
  } else {
    context = skipParens ? 'noParensArg' : 'parensArg'
  }

  if (left.length > 0 && keywords !== undefined && skipParens && !multipleGenerators) {
    return noParensKeywordsToAlgebra(left, keywords, context, head, state)
  }

  let leftArgs = left
  let rightArg = right
  if (keywords !== undefined) {
    leftArgs = [...left, ...keywords.items.slice(0, -1)]
    rightArg = keywords.items[keywords.items.length - 1]
  }

  const leftDoc = argsToAlgebra(leftArgs, (arg) => quotedToAlgebra(arg, context, state))
  const rightDoc = quotedToAlgebra(rightArg, context, state)

  return withNextBreakFits(nextBreakFits(rightArg), rightDoc, (argDoc) => {
    let argsDoc = leftArgs.length === 0 ? argDoc : glue([leftDoc, ','], argDoc)
    if (multipleGenerators) argsDoc = forceBreak(argsDoc)

    if (skipParens) {
      return group([' ', nestWhenBroken(argsDoc, flatWidth(head) + 1)])
    }
    return surround('(', argsDoc, ')', 'break')
  })
}

/**
 * `call arg, key: value` keeps the positional arguments on the call line
 * and moves the keywords, one per line, below them when they do not fit
 */
function noParensKeywordsToAlgebra(
  left: Quoted[],
  keywords: { items: Quoted[] },
  context: Context,
  head: Doc,
  state: FormatState,
): Doc {
  const leftDoc = group(argsToAlgebra(left, (arg) => quotedToAlgebra(arg, context, state)))
  const keywordsDoc = argsToAlgebra(keywords.items, (arg) => quotedToAlgebra(arg, context, state))
  const width = flatWidth(head) + 1

  const broken = [' ', nest([leftDoc, ',', group([line, keywordsDoc], { shouldBreak: true })], width)]
  if (hasForcedBreak(leftDoc) || hasForcedBreak(keywordsDoc)) {
    return [broken, breakParent]
  }
  return conditionalGroup([[' ', leftDoc, ',', group([line, keywordsDoc])], broken])
}

function lastArgToKeyword(arg: Quoted, listToKeyword: boolean): { items: Quoted[] } | undefined {
  if (arg.type === 'list' && arg.items.length > 0) {
    return isKeyword(arg.items) ? { items: arg.items } : undefined
  }
  const value = blockValue(arg)
  if (listToKeyword && value !== undefined && value.type === 'list' && value.items.length > 0) {
    return isKeyword(value.items) ? { items: value.items } : undefined
  }
  return undefined
}

function isKeyword(items: Quoted[]): boolean {
  return items.every((item) => item.type === 'pair' && isKeywordKey(item.left))
}

function isKeywordKey(node: Quoted): boolean {
  if (isCallTo(node, '__block__') && node.args.length === 1) {
    return node.meta.format === 'keyword'
  }
  const dot = node.type === 'call' ? dotCall(node.callee) : undefined
  if (
    node.type === 'call' &&
    dot !== undefined &&
    dot.fun === 'binary_to_atom' &&
    dot.target.type === 'atom' &&
    dot.target.value === 'erlang'
  ) {
    const [binary] = node.args
    return isCallTo(binary, '<<>>') && binary.meta.format === 'keyword'
  }
  return false
}

function interpolatedAtomEntries(node: Quoted): Quoted[] | undefined {
  if (node.type !== 'call') return undefined
  const [binary] = node.args
  return isCallTo(binary, '<<>>') ? binary.args : undefined
}

/**
 * Arguments joined by a comma and a breakable space
 */
function argsToAlgebra(args: Quoted[], fun: (arg: Quoted) => Doc): Doc {
  if (args.length === 0) return empty
  return args.map(fun).reduce((acc: Doc, doc) => glue([acc, ','], doc))
}

// ===========================================
// Do/end blocks
// ===========================================

interface DoEndBlock {
  key: string
  line: number
  endLine: number
  value: Quoted
}

function doEndBlocks(arg: Quoted): DoEndBlock[] | undefined {
  if (arg.type !== 'list' || arg.items.length === 0) return undefined
  const [first] = arg.items
  if (first.type !== 'pair' || !isCallTo(first.left, '__block__')) return undefined

  const doKey = blockValue(first.left)
  const doMeta = first.left.meta
  if (doKey === undefined || doKey.type !== 'atom' || doKey.value !== 'do' || doMeta.format !== 'block') {
    return undefined
  }

  const sections = arg.items.map((item) => {
    const key = item.type === 'pair' ? blockValue(item.left) : undefined
    if (item.type !== 'pair' || !isCallTo(item.left, '__block__') || key?.type !== 'atom') {
      throw new FormatterInvariantError('do/end block section without an atom key')
    }
    return { key: key.value, line: lineOf(item.left.meta), value: item.right }
  })

  return sections.map((section, i) => ({
    ...section,
    endLine: i + 1 < sections.length ? sections[i + 1].line : endLineOf(doMeta),
  }))
}

function doEndBlocksToAlgebra(blocks: DoEndBlock[], state: FormatState): Doc {
  const docs = blocks.map(({ key, line: start, endLine, value }) => {
    const valueDoc = clausesToAlgebra(value, start, endLine, state)
    return isEmpty(valueDoc) ? key : nest(lines(key, valueDoc), 2)
  })
  return join(newline, docs)
}

// ===========================================
// Interpolation and sigils
// ===========================================

interface Interpolation {
  meta: Meta
  quoted: Quoted
}

/**
 * `{:"::", _, [{{:., _, [Kernel, :to_string]}, meta, [quoted]}, {:binary, _, _}]}`
 */
function interpolationOf(entry: Quoted): Interpolation | undefined {
  if (!isCallTo(entry, '::') || entry.args.length !== 2) return undefined
  const [conversion, type] = entry.args
  if (conversion.type !== 'call' || conversion.args.length !== 1) return undefined

  const dot = dotCall(conversion.callee)
  const isBinaryType =
    (type.type === 'var' && type.name === 'binary') || isCallTo(type, 'binary')
  if (dot === undefined || dot.fun !== 'to_string' || !isModuleAtom(dot.target, 'Kernel') || !isBinaryType) {
    return undefined
  }
  return { meta: conversion.meta, quoted: conversion.args[0] }
}

function isInterpolated(entries: Quoted[]): boolean {
  return entries.every((entry) => entry.type === 'string' || interpolationOf(entry) !== undefined)
}

/**
 * @param delimiter Escaped inside string parts, null inside heredocs
 */
function interpolationToAlgebra(
  entries: Quoted[],
  delimiter: string | null,
  state: FormatState,
  first: Doc,
  last: Doc,
): Doc {
  const parts: Doc[] = [first]
  for (const entry of entries) {
    if (entry.type === 'string') {
      parts.push(delimiter === null ? escapeHeredoc(entry.value) : escapeString(entry.value, delimiter))
      continue
    }
    const interpolation = interpolationOf(entry)
    if (interpolation === undefined) {
      throw new FormatterInvariantError('malformed interpolation entry')
    }
    const { meta, quoted } = interpolation
    parts.push(surround('#{', blockToAlgebra(quoted, lineOf(meta), endLineOf(meta), state), '}'))
  }
  parts.push(last)
  return parts
}

function binaryLiteralToAlgebra(meta: Meta, entries: Quoted[], state: FormatState): Doc {
  if (entries.length === 0) return '<<>>'
  if (!isInterpolated(entries)) return bitstringToAlgebra(meta, entries, state)
  if (meta.format === 'binHeredoc') {
    const initial = forceBreak([DOUBLE_HEREDOC, newline])
    return interpolationToAlgebra(entries, null, state, initial, DOUBLE_HEREDOC)
  }
  return interpolationToAlgebra(entries, '"', state, '"', '"')
}

function sigilToAlgebra(fun: string, meta: Meta, args: Quoted[], state: FormatState): Doc | undefined {
  const [body, modifiersNode] = args
  if (!/^sigil_.$/su.test(fun) || args.length !== 2 || !isCallTo(body, '<<>>')) {
    return undefined
  }

  const opening = meta.terminator
  if (opening === undefined) {
    throw new FormatterInvariantError(`${fun} has no terminator`)
  }
  const modifierList = modifiersNode.type === 'list' ? modifiersNode : blockValue(modifiersNode)
  if (modifierList === undefined || modifierList.type !== 'list') {
    throw new FormatterInvariantError(`${fun} modifiers are not a charlist`)
  }
  const modifiers = charlistToString(modifierList.items)
  const start = `~${fun.slice('sigil_'.length)}${opening}`

  if (opening === DOUBLE_HEREDOC || opening === SINGLE_HEREDOC) {
    return interpolationToAlgebra(body.args, null, state, forceBreak([start, newline]), opening + modifiers)
  }
  const closing = closingSigilTerminator(opening)
  return interpolationToAlgebra(body.args, closing, state, start, closing + modifiers)
}

// ===========================================
// Containers
// ===========================================

/**
 * Container elements with their comments, comma separated
 * Elements go one per line when the source had a newline after the opening
 * bracket or when comments were placed among them.
 */
function argsToAlgebraWithComments(
  args: Quoted[],
  meta: Meta,
  state: FormatState,
  fun: (arg: Quoted, index: number) => Doc,
): Doc {
  const pending = state.comments.length
  const docs = quotedToAlgebraWithComments(
    args,
    lineOf(meta),
    endLineOf(meta),
    1,
    state,
    (arg, index, newlines) => {
      const doc = fun(arg, index)
      return { doc: index === args.length - 1 ? doc : [doc, ','], nextLine: 'none', newlines }
    },
  )

  if (docs.length === 0) return empty
  if (meta.eol === true || state.comments.length !== pending) {
    return forceBreak(join(newline, docs))
  }
  return join(line, docs)
}

function listToAlgebra(meta: Meta, args: Quoted[], state: FormatState): Doc {
  const argsDoc = argsToAlgebraWithComments(args, meta, state, (arg) =>
    quotedToAlgebra(arg, 'parensArg', state),
  )
  return surround('[', argsDoc, ']')
}

function mapToAlgebra(meta: Meta, nameDoc: Doc, args: Quoted[], state: FormatState): Doc {
  const open = ['%', nameDoc, '{']
  const [update] = args

  // %{map | key: value}
  if (args.length === 1 && isCallTo(update, '|') && update.args.length === 2) {
    const [left, right] = update.args
    const leftDoc = quotedToAlgebra(left, 'parensArg', state)
    const entries = right.type === 'list' ? right.items : [right]
    const rightDoc = argsToAlgebraWithComments(entries, meta, state, (arg) =>
      quotedToAlgebra(arg, 'parensArg', state),
    )
    return surround(open, group(glue(leftDoc, ['| ', nest(rightDoc, 2)])), '}')
  }

  const argsDoc = argsToAlgebraWithComments(args, meta, state, (arg) =>
    quotedToAlgebra(arg, 'parensArg', state),
  )
  return surround(open, argsDoc, '}')
}

function tupleToAlgebra(meta: Meta, args: Quoted[], state: FormatState): Doc {
  const argsDoc = argsToAlgebraWithComments(args, meta, state, (arg) =>
    quotedToAlgebra(arg, 'parensArg', state),
  )
  return surround('{', argsDoc, '}')
}

function bitstringToAlgebra(meta: Meta, segments: Quoted[], state: FormatState): Doc {
  const last = segments.length - 1
  const argsDoc = argsToAlgebraWithComments(segments, meta, state, (segment, index) =>
    bitstringSegmentToAlgebra(segment, index, last, state),
  )
  return surround('<<', argsDoc, '>>')
}

function bitstringSegmentToAlgebra(segment: Quoted, index: number, last: number, state: FormatState): Doc {
  if (isCallTo(segment, '::') && segment.args.length === 2) {
    const [value, spec] = segment.args
    const valueDoc = quotedToAlgebra(value, 'parensArg', state)
    const specDoc = bitstringSpecToAlgebra(spec, state)
    // <<x::(:atom)>>
    const wrappedSpec = typeof specDoc === 'string' && specDoc.startsWith(':') ? `(${specDoc})` : specDoc
    return bitstringWrapParens([valueDoc, '::', wrappedSpec], index, last)
  }
  return bitstringWrapParens(quotedToAlgebra(segment, 'parensArg', state), index, last)
}

function bitstringSpecToAlgebra(spec: Quoted, state: FormatState): Doc {
  if ((isCallTo(spec, '-') || isCallTo(spec, '*')) && spec.args.length === 2) {
    const [left, right] = spec.args
    return [
      bitstringSpecToAlgebra(left, state),
      spec.callee === '-' ? '-' : '*',
      quotedToAlgebraWithParensIfNecessary(right, 'parensArg', state),
    ]
  }
  return quotedToAlgebraWithParensIfNecessary(spec, 'parensArg', state)
}

function bitstringWrapParens(doc: Doc, index: number, last: number): Doc {
  if (index !== 0 && index !== last) return doc
  const text = formatToString(doc)
  if ((index === 0 && text.startsWith('<<')) || (index === last && text.endsWith('>>'))) {
    return wrapInParens(doc)
  }
  return doc
}

// ===========================================
// Anonymous functions, type functions and clauses
// ===========================================

interface Clause {
  meta: Meta
  args: Quoted[]
  body: Quoted
}

function startsWithClause(items: Quoted[]): boolean {
  return items.length > 0 && isCallTo(items[0], '->')
}

function clauseOf(node: Quoted): Clause {
  if (!isCallTo(node, '->') || node.args.length !== 2) {
    throw new FormatterInvariantError('clause list contains a non-clause element')
  }
  const [args, body] = node.args
  if (args.type !== 'list') {
    throw new FormatterInvariantError('clause arguments are not a list')
  }
  return { meta: node.meta, args: args.items, body }
}

function forceClauses(doc: Doc, clauses: Clause[]): Doc {
  return clauses.some((clause) => clause.meta.eol === true) ? forceBreak(doc) : doc
}

function anonFunToAlgebra(clauses: Quoted[], minLine: number, maxLine: number, state: FormatState): Doc {
  if (clauses.length === 1) {
    const clause = clauseOf(clauses[0])
    const clauseLine = lineOf(clause.meta)

    // fn -> body end
    if (clause.args.length === 0) {
      const body = blockToAlgebra(clause.body, clauseLine, maxLine, state)
      return group(forceClauses(glue(nest(glue('fn ->', body), 2), 'end'), [clause]))
    }

    // fn args -> body end
    const argsDoc = clauseArgsToAlgebra(clause.args, clauseLine, state)
    const body = blockToAlgebra(clause.body, clauseLine, maxLine, state)
    const headDoc = nest(['fn ', group(argsDoc), ' ->'], 1)
    return group(forceClauses(glue(nest(glue(headDoc, body), 2), 'end'), [clause]))
  }

  const clausesDoc = clauseListToAlgebra(clauses, minLine, maxLine, state)
  return forceBreak(lines(nest(lines('fn', clausesDoc), 2), 'end'))
}

function typeFunToAlgebra(clauses: Quoted[], minLine: number, maxLine: number, state: FormatState): Doc {
  if (clauses.length === 1) {
    const clause = clauseOf(clauses[0])
    const clauseLine = lineOf(clause.meta)

    // (() -> body)
    if (clause.args.length === 0) {
      const prefix = '(() -> '
      const body = blockToAlgebra(clause.body, clauseLine, maxLine, state)
      return group(forceClauses([prefix, nest(body, prefix.length), ')'], [clause]))
    }

    // (args -> body)
    const argsDoc = clauseArgsToAlgebra(clause.args, clauseLine, state)
    const body = blockToAlgebra(clause.body, clauseLine, maxLine, state)
    const doc = wrapInParens([group(argsDoc), nest(glue(' ->', body), 2)])
    return group(forceClauses(doc, [clause]))
  }

  const clausesDoc = clauseListToAlgebra(clauses, minLine, maxLine, state)
  return forceBreak(lines(nest(lines('(', clausesDoc), 2), ')'))
}

/**
 * Body of a do/end section: a clause list or a block
 */
function clausesToAlgebra(value: Quoted, minLine: number, maxLine: number, state: FormatState): Doc {
  if (value.type === 'list' && startsWithClause(value.items)) {
    return clauseListToAlgebra(value.items, minLine, maxLine, state)
  }
  const doc = blockToAlgebra(value, minLine, maxLine, state)
  return isEmpty(doc) ? empty : group(doc)
}

/**
 * Clauses one after another; when the list breaks, every clause body
 * goes below its arrow and clauses are separated by a blank line
 */
function clauseListToAlgebra(items: Quoted[], minLine: number, maxLine: number, state: FormatState): Doc {
  const clauses = items.map(clauseOf)
  const lastIndex = clauses.length - 1
  clauses[lastIndex] = { ...clauses[lastIndex], meta: { ...clauses[lastIndex].meta, endLine: maxLine } }

  const id = Symbol('clauses')
  const docs = clauses.map((clause) => clauseToAlgebra(clause, minLine, state, id))
  return group(forceClauses(join([maybeEmptyLine(id), newline], docs), clauses), { id })
}

function clauseToAlgebra(clause: Clause, minLine: number, state: FormatState, listId: symbol): Doc {
  const { meta, args, body } = clause

  if (args.length === 0) {
    const bodyDoc = blockToAlgebra(body, lineOf(meta), endLineOf(meta), state)
    return ['()', clauseBody(bodyDoc, listId)]
  }

  const nesting = state.operandNesting
  state.operandNesting = nesting + 2
  const argsDoc = clauseArgsToAlgebra(args, minLine, state)
  state.operandNesting = nesting

  const bodyDoc = blockToAlgebra(body, minLine, endLineOf(meta), state)
  return [group(argsDoc), clauseBody(bodyDoc, listId)]
}

/**
 * ` -> body`, below the arrow when the clause list breaks, and on the same
 * line or below it depending on its own width otherwise
 */
function clauseBody(body: Doc, listId: symbol): Doc {
  return ifBreak(
    nest([' ->', newline, body], 2),
    group(nest(glue(' ->', body), 2)),
    { groupId: listId },
  )
}

function clauseArgsToAlgebra(args: Quoted[], minLine: number, state: FormatState): Doc {
  // fn a, b when c -> d end
  const [guarded] = args
  if (args.length === 1 && isCallTo(guarded, 'when') && guarded.args.length >= 2) {
    const whenArgs = guarded.args.slice(0, -1)
    const guard = guarded.args[guarded.args.length - 1]
    const left: ClauseArgs = { type: 'clauseArgs', args: whenArgs, minLine }
    return binaryOpToAlgebra('when', 'when', guarded.meta, left, guard, 'noParensArg', state)
  }

  if (args.length === 0) return '()'

  return argsToAlgebraWithComments(args, { line: minLine }, state, (arg) =>
    quotedToAlgebra(arg, 'noParensArg', state),
  )
}

// ===========================================
// Next break fits
// ===========================================

/**
 * Whether a trailing argument may break while the call head stays on its line
 */
function nextBreakFits(node: Quoted): boolean {
  if (node.type === 'pair') {
    // key: value
    const key = blockValue(node.left)
    return key !== undefined && key.type === 'atom' && nextBreakFits(node.right)
  }
  if (node.type !== 'call') return false

  const { callee, meta, args } = node
  if (typeof callee !== 'string') {
    const dot = dotCall(callee)
    const [binary] = args
    return (
      dot !== undefined &&
      dot.fun === 'to_charlist' &&
      isModuleAtom(dot.target, 'String') &&
      args.length === 1 &&
      isCallTo(binary, '<<>>') &&
      binary.args.length > 0 &&
      binary.meta.format === 'listHeredoc'
    )
  }

  switch (callee) {
    case '<<>>':
      return args.length > 0 && (meta.format === 'binHeredoc' || !isInterpolated(args))
    case '{}':
      return true
    case '__block__': {
      const value = blockValue(node)
      if (value?.type === 'pair') return true
      if (value?.type === 'string') return meta.format === 'binHeredoc'
      if (value?.type === 'list') return meta.format !== 'charlist'
      break
    }
    case 'fn':
    case '%{}':
    case '%':
      if (args.length > 0) return true
      break
  }

  return (
    (meta.terminator === DOUBLE_HEREDOC || meta.terminator === SINGLE_HEREDOC) &&
    callee.startsWith('sigil_')
  )
}
