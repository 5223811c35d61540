/**
 * Formatter configuration and the state threaded through a format run
 */

import { readFileSync } from 'node:fs'
import type { GatheredComment } from './comments.js'

export type LocalArity = number | '*'

export interface FormatOptions {
  /** Extra local calls printed without parens, e.g. ['plug', 2] or ['field', '*'] */
  localsWithoutParens?: Array<[string, LocalArity]>
  /** Rewrite deprecated calls that have a replacement as of this Elixir version */
  renameDeprecatedAt?: string
  file?: string
  line?: number
  printWidth?: number
  debug?: boolean
}

export const DEFAULT_PRINT_WIDTH = 98

export interface Version {
  major: number
  minor: number
  patch: number
  pre: string[]
}

export interface FormatState {
  /** Gathered comments not yet placed, ordered by line */
  comments: GatheredComment[]
  localsWithoutParens: Set<string>
  operandNesting: number
  renameDeprecatedAt: Version | null
}

// ===========================================
// Calls without parens
// ===========================================

interface LocalsTable {
  specialForms: string[]
  kernel: string[]
  testing: string[]
}

function isStringList(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string')
}

function isLocalsTable(value: unknown): value is LocalsTable {
  if (typeof value !== 'object' || value === null) return false
  if (!('specialForms' in value) || !('kernel' in value) || !('testing' in value)) return false
  return isStringList(value.specialForms) && isStringList(value.kernel) && isStringList(value.testing)
}

function loadLocalsWithoutParens(): string[] {
  const raw: unknown = JSON.parse(
    readFileSync(new URL('../data/locals-without-parens.json', import.meta.url), 'utf8'),
  )
  if (!isLocalsTable(raw)) {
    throw new Error('data/locals-without-parens.json does not describe a locals table')
  }
  return [...raw.specialForms, ...raw.kernel, ...raw.testing]
}

const BUILTIN_LOCALS_WITHOUT_PARENS = loadLocalsWithoutParens()

function localKey(name: string, arity: LocalArity): string {
  return `${name}/${arity}`
}

/**
 * Whether a local call with this many arguments may drop its parens
 */
export function skipsParens(state: FormatState, name: string, arity: number): boolean {
  return (
    arity > 0 &&
    (state.localsWithoutParens.has(localKey(name, '*')) ||
      state.localsWithoutParens.has(localKey(name, arity)))
  )
}

/**
 * Parse `name/arity` and `name/*` entries separated by commas
 */
export function parseLocalsWithoutParens(text: string): Array<[string, LocalArity]> {
  const entries: Array<[string, LocalArity]> = []
  for (const part of text.split(',')) {
    const entry = part.trim()
    if (entry === '') continue
    const slash = entry.lastIndexOf('/')
    const name = entry.slice(0, slash)
    const arity = entry.slice(slash + 1)
    if (slash <= 0) {
      throw new TypeError(`invalid locals_without_parens entry ${JSON.stringify(entry)}`)
    }
    if (arity === '*') {
      entries.push([name, '*'])
    } else if (/^\d+$/.test(arity)) {
      entries.push([name, Number(arity)])
    } else {
      throw new TypeError(`invalid locals_without_parens entry ${JSON.stringify(entry)}`)
    }
  }
  return entries
}

// ===========================================
// Versions
// ===========================================

const VERSION_PATTERN =
  /^(0|[1-9]\d*)\.(0|[1-9]\d*)\.(0|[1-9]\d*)(?:-([0-9A-Za-z-]+(?:\.[0-9A-Za-z-]+)*))?(?:\+[0-9A-Za-z-]+(?:\.[0-9A-Za-z-]+)*)?$/

export function parseVersion(text: string): Version | undefined {
  const match = VERSION_PATTERN.exec(text)
  if (match === null) return undefined
  const [, major, minor, patch, pre] = match
  return {
    major: Number(major),
    minor: Number(minor),
    patch: Number(patch),
    pre: pre === undefined ? [] : pre.split('.'),
  }
}

function comparePre(left: string[], right: string[]): number {
  if (left.length === 0 || right.length === 0) {
    // a release sorts after its pre-releases
    return right.length - left.length
  }
  for (let i = 0; i < Math.min(left.length, right.length); i++) {
    const a = left[i]
    const b = right[i]
    if (a === b) continue
    const numericA = /^\d+$/.test(a)
    const numericB = /^\d+$/.test(b)
    if (numericA && numericB) return Number(a) - Number(b)
    if (numericA) return -1
    if (numericB) return 1
    return a < b ? -1 : 1
  }
  return left.length - right.length
}

export function compareVersions(left: Version, right: Version): number {
  return (
    left.major - right.major ||
    left.minor - right.minor ||
    left.patch - right.patch ||
    comparePre(left.pre, right.pre)
  )
}

/**
 * Check a version against a `~>` requirement
 * `~> 1.4` allows 1.4.0 up to, not including, 2.0.0.
 * `~> 1.4.2` allows 1.4.2 up to, not including, 1.5.0.
 */
export function matchesRequirement(version: Version, requirement: string): boolean {
  const match = /^~>\s*(\d+)\.(\d+)(?:\.(\d+))?$/.exec(requirement.trim())
  if (match === null) {
    throw new TypeError(`unsupported version requirement ${JSON.stringify(requirement)}`)
  }
  const [, major, minor, patch] = match
  const lower: Version = {
    major: Number(major),
    minor: Number(minor),
    patch: patch === undefined ? 0 : Number(patch),
    pre: [],
  }
  const upper: Version =
    patch === undefined
      ? { major: lower.major + 1, minor: 0, patch: 0, pre: [] }
      : { major: lower.major, minor: lower.minor + 1, patch: 0, pre: [] }
  const belowUpper =
    version.major - upper.major || version.minor - upper.minor || version.patch - upper.patch
  return compareVersions(version, lower) >= 0 && belowUpper < 0
}

// ===========================================
// State
// ===========================================

export function createState(comments: GatheredComment[], options: FormatOptions = {}): FormatState {
  const locals = new Set(BUILTIN_LOCALS_WITHOUT_PARENS)
  for (const [name, arity] of options.localsWithoutParens ?? []) {
    locals.add(localKey(name, arity))
  }

  let renameDeprecatedAt: Version | null = null
  if (options.renameDeprecatedAt !== undefined) {
    const version = parseVersion(options.renameDeprecatedAt)
    if (version === undefined) {
      throw new TypeError(
        `invalid version ${JSON.stringify(options.renameDeprecatedAt)} given to renameDeprecatedAt`,
      )
    }
    renameDeprecatedAt = version
  }

  return {
    comments,
    localsWithoutParens: locals,
    operandNesting: 2,
    renameDeprecatedAt,
  }
}
