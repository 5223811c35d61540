/**
 * Comment reattachment for the Elixir formatter
 * Comments are kept apart from the tree and merged back in by line.
 */

import type { Doc } from 'prettier'
import { group, ifBreak, lines, newline } from './algebra.js'
import { FormatterInvariantError } from './errors.js'
import type { Quoted, SourceComment } from './parser.js'
import { traverseLine } from './parser.js'
import type { FormatState } from './state.js'

/** Newlines that count as a blank line */
const BLANK_LINE_NEWLINES = 2

/**
 * One or more adjacent comments ready to be placed
 */
export interface GatheredComment {
  line: number
  /** Newlines before the first comment */
  previous: number
  /** Newlines after the last comment */
  next: number
  doc: Doc
}

/**
 * - none: nothing extra around the item
 * - flex: a blank line around the item when it spans several lines
 */
type NextLine = 'none' | 'flex'

/**
 * A placed item: a translated node or a comment
 */
interface Entry {
  doc: Doc
  nextLine: NextLine
  /** Newlines the user put before the item */
  newlines: number
}

type EntryBuilder = (
  node: Quoted,
  index: number,
  newlines: number,
  state: FormatState,
) => Entry

/**
 * Normalize `#comment` to `# comment`, leaving leading `#` runs intact
 */
export function formatComment(text: string): string {
  const hashes = /^#+/.exec(text)
  if (hashes === null) return text
  const [prefix] = hashes
  const rest = text.slice(prefix.length)
  if (rest === '' || rest.startsWith(' ')) return text
  return `${prefix} ${rest}`
}

/**
 * Merge comments on consecutive lines into a single entry
 */
export function gatherComments(comments: SourceComment[]): GatheredComment[] {
  const gathered: GatheredComment[] = []
  let i = 0
  let lastLine = -1

  while (i < comments.length) {
    const { line, previousEol, nextEol, text } = comments[i]
    if (line <= lastLine) {
      throw new FormatterInvariantError(`comment on line ${line} is out of order`)
    }
    lastLine = line
    i++

    if (previousEol === null) {
      gathered.push({ line, previous: BLANK_LINE_NEWLINES, next: nextEol, doc: text })
      continue
    }

    let doc: Doc = text
    let next = nextEol
    let expected = line + 1
    while (i < comments.length) {
      const followup = comments[i]
      if (followup.line !== expected || followup.previousEol === null) break
      doc = lines(doc, followup.text)
      next = followup.nextEol
      lastLine = followup.line
      expected++
      i++
    }
    gathered.push({ line, previous: previousEol, next, doc })
  }

  return gathered
}

/**
 * Translate `nodes` with `build`, placing the pending comments around them
 * Comments at or before `minLine` are left for an outer call; comments
 * after the last node but before `maxLine` are placed at the end.
 */
export function quotedToAlgebraWithComments(
  nodes: Quoted[],
  minLine: number,
  maxLine: number,
  newlines: number,
  state: FormatState,
  build: EntryBuilder,
): Doc[] {
  const firstAfterMin = state.comments.findIndex((comment) => comment.line > minLine)
  const splitAt = firstAfterMin === -1 ? state.comments.length : firstAfterMin
  const preComments = state.comments.slice(0, splitAt)
  state.comments = state.comments.slice(splitAt)

  const entries: Entry[] = []

  nodes.forEach((node, index) => {
    const [docStart, docEnd] = traverseLine(node)

    let docNewlines = newlines
    let head = state.comments[0]
    while (head !== undefined && head.line < docStart) {
      entries.push({ doc: head.doc, nextLine: 'none', newlines: head.previous })
      docNewlines = head.next
      state.comments = state.comments.slice(1)
      head = state.comments[0]
    }

    const entry = build(node, index, docNewlines, state)

    let entryNewlines = entry.newlines
    head = state.comments[0]
    while (head !== undefined && head.line >= docStart && head.line <= docEnd) {
      entries.push({ doc: head.doc, nextLine: 'none', newlines: entryNewlines })
      entryNewlines = 1
      state.comments = state.comments.slice(1)
      head = state.comments[0]
    }

    entries.push({ ...entry, newlines: entryNewlines })
  })

  for (const comment of state.comments) {
    if (comment.line < maxLine) {
      entries.push({ doc: comment.doc, nextLine: 'none', newlines: comment.previous })
    }
  }
  state.comments = [...preComments, ...state.comments.filter((comment) => comment.line >= maxLine)]

  return mergeAlgebraWithComments(entries)
}

type Separator = 'none' | 'flex' | 'hard'

/**
 * Wrap each entry in its own group and attach the separators that follow it
 * Callers join the result with a newline (or a breakable line). A blank line
 * separates two items when the user wrote one, or when either item spans
 * several lines and asked for flex spacing; never more than one.
 */
function mergeAlgebraWithComments(entries: Entry[]): Doc[] {
  const separators: Separator[] = entries.map((entry, i) => {
    const next = entries[i + 1]
    if (next === undefined) return 'none'
    return next.newlines >= BLANK_LINE_NEWLINES ? 'hard' : entry.nextLine
  })
  const ids = separators.map((separator) => (separator === 'flex' ? Symbol('entry') : undefined))

  return entries.map((entry, i) => {
    const previousId = i > 0 && separators[i - 1] === 'flex' ? ids[i - 1] : undefined
    const contents: Doc =
      previousId === undefined
        ? entry.doc
        : [ifBreak(ifBreak('', newline, { groupId: previousId }), ''), entry.doc]
    const doc = group(contents, { id: ids[i] })

    const separator = separators[i]
    if (separator === 'hard') return [doc, newline]
    if (separator === 'flex') return [doc, ifBreak(newline, '', { groupId: ids[i] })]
    return doc
  })
}
