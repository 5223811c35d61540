/**
 * Layout combinators on top of Prettier's doc builders
 */

import type { Doc } from 'prettier'
import { doc } from 'prettier'

const { builders, printer } = doc
const {
  group,
  align,
  line,
  softline,
  ifBreak,
  conditionalGroup,
  breakParent,
  hardlineWithoutBreakParent,
  literallineWithoutBreakParent,
  join,
} = builders

export { group, join, line, breakParent, ifBreak, conditionalGroup }

export const empty: Doc = ''

/** Newline that leaves the enclosing group's decision alone */
export const newline: Doc = hardlineWithoutBreakParent

/** Newline back to column 0 */
export const resetLine: Doc = literallineWithoutBreakParent

export type NestMode = 'always' | 'break'

export function isEmpty(d: Doc): boolean {
  return d === '' || (Array.isArray(d) && d.every(isEmpty))
}

/**
 * `left`, a breakable space, `right`
 */
export function glue(left: Doc, right: Doc): Doc {
  return [left, line, right]
}

/**
 * `left` and `right` on separate lines
 */
export function lines(left: Doc, right: Doc): Doc {
  return [left, newline, right]
}

export function space(left: Doc, right: Doc): Doc {
  return [left, ' ', right]
}

export function forceBreak(d: Doc): Doc {
  return [d, breakParent]
}

export function nest(d: Doc, indentation: number): Doc {
  return indentation === 0 ? d : align(indentation, d)
}

/**
 * Nest only when the enclosing group breaks
 */
export function nestWhenBroken(d: Doc, indentation: number): Doc {
  return indentation === 0 ? d : ifBreak(align(indentation, d), d)
}

/**
 * Blank line when the group with `groupId` breaks, nothing otherwise
 */
export function maybeEmptyLine(groupId?: symbol): Doc {
  return ifBreak(newline, '', { groupId })
}

/**
 * `left`, doc nested by two behind a soft break, soft break, `right`
 */
export function surround(left: Doc, d: Doc, right: Doc, nestMode: NestMode = 'always'): Doc {
  if (isEmpty(d)) return [left, right]
  const inner = [left, softline, d]
  return group([
    nestMode === 'always' ? nest(inner, 2) : nestWhenBroken(inner, 2),
    softline,
    right,
  ])
}

export function wrapInParens(d: Doc): Doc {
  return ['(', nest(d, 1), ')']
}

/**
 * Group that keeps breaks inside it from breaking the groups around it
 */
function isolate(d: Doc): Doc {
  return conditionalGroup([d])
}

/**
 * Lay out `fun(d)` so that `d`, usually the last argument, may break
 * while everything before it stays on one line.
 */
export function withNextBreakFits(enabled: boolean, d: Doc, fun: (d: Doc) => Doc): Doc {
  if (!enabled) return fun(d)
  const flat = fun(isolate(d))
  const expanded = conditionalGroup([
    flat,
    fun(isolate(group(d, { shouldBreak: true }))),
    fun(d),
  ])
  return hasForcedBreak(flat) ? [expanded, breakParent] : expanded
}

/**
 * Whether a forced break inside `d` reaches the groups around it
 */
export function hasForcedBreak(d: Doc): boolean {
  if (typeof d === 'string') return false
  if (Array.isArray(d)) return d.some(hasForcedBreak)
  switch (d.type) {
    case 'break-parent':
      return true
    case 'group':
      if (Array.isArray(d.expandedStates)) return false
      return Boolean(d.break) || hasForcedBreak(d.contents)
    case 'align':
    case 'indent':
    case 'label':
    case 'line-suffix':
      return hasForcedBreak(d.contents)
    case 'if-break':
      return hasForcedBreak(d.breakContents) || hasForcedBreak(d.flatContents)
    case 'fill':
      return d.parts.some(hasForcedBreak)
    default:
      return false
  }
}

export function render(d: Doc, printWidth: number): string {
  return printer.printDocToString(d, { printWidth, tabWidth: 2, useTabs: false }).formatted
}

/**
 * Render without any width limit
 */
export function formatToString(d: Doc): string {
  return render(d, Number.POSITIVE_INFINITY)
}

/**
 * Width of the last line of `d` rendered without a width limit
 */
export function flatWidth(d: Doc): number {
  const text = formatToString(d)
  return text.length - (text.lastIndexOf('\n') + 1)
}
