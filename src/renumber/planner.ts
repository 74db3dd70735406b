/**
 * Renumbering planner.
 *
 * Pushes a page and every later sibling forward so that a new section can be
 * inserted before it, and carries the new numbers down into each moved
 * sibling's subtree. The planner only reads the forest; the resulting plan is
 * applied page by page with {@link applyRenumbering}.
 */

import type { DottedNumber, Page } from '../types/book.js'
import { getPageNumber, joinNumber, replacePrefix, splitLast } from './number.js'
import { locateSiblings, walkSubtree } from './tree.js'

/**
 * One page whose section number changes.
 */
export interface PlanEntry {
  pageId: number
  /** Title before renumbering. */
  title: string
  oldNumber: DottedNumber
  newNumber: DottedNumber
}

/**
 * Why a renumbering produced no entries.
 *
 * - `invalidOffset`: the offset is negative or not an integer, which would
 *   collide with the untouched preceding sibling
 * - `notFound`: the start page is not in the forest
 * - `unparsableNumber`: no usable number to continue from
 * - `noOp`: every number already has its planned value
 */
export type RenumberIssue = 'invalidOffset' | 'notFound' | 'unparsableNumber' | 'noOp'

/**
 * Outcome of planning a renumbering.
 */
export type RenumberOutcome =
  | { ok: true; entries: PlanEntry[] }
  | { ok: false; reason: RenumberIssue; message: string; entries: PlanEntry[] }

/**
 * Numbering every moved sibling continues from.
 */
interface StartingPoint {
  prefix: string[]
  last: number
}

/**
 * Works out the prefix and the first last-component for the moved siblings.
 *
 * With a numbered preceding sibling `p.n`, the start page lands on
 * `p.(n + offset + 1)`, leaving `offset` free slots after the preceding
 * sibling. Otherwise the start page's own number is shifted by `offset`.
 */
function findStartingPoint(siblings: readonly Page[], index: number, offset: number): StartingPoint | undefined {
  const previous = index > 0 ? siblings[index - 1] : undefined
  const previousNumber = previous ? getPageNumber(previous.title) : undefined
  const previousSplit = previousNumber !== undefined ? splitLast(previousNumber) : undefined
  if (previousSplit) {
    return { prefix: previousSplit.prefix, last: previousSplit.last + offset + 1 }
  }

  const start = siblings[index]
  const ownNumber = start ? getPageNumber(start.title) : undefined
  const ownSplit = ownNumber !== undefined ? splitLast(ownNumber) : undefined
  if (ownSplit) {
    return { prefix: ownSplit.prefix, last: ownSplit.last + offset }
  }

  return undefined
}

/**
 * Plans the descendant entries of one moved sibling.
 *
 * Every descendant is checked against the sibling's own old/new pair, at any
 * depth, so numbers are migrated by the single prefix that actually moved.
 */
function planDescendants(sibling: Page, oldNumber: DottedNumber, newNumber: DottedNumber): PlanEntry[] {
  const entries: PlanEntry[] = []
  for (const child of sibling.children) {
    for (const page of walkSubtree(child)) {
      const number = getPageNumber(page.title)
      if (number === undefined || !number.startsWith(`${oldNumber}.`)) {
        continue
      }
      const moved = replacePrefix(number, oldNumber, newNumber)
      if (moved !== number) {
        entries.push({ pageId: page.id, title: page.title, oldNumber: number, newNumber: moved })
      }
    }
  }
  return entries
}

/**
 * Plans a renumbering and reports why nothing changed when the plan is empty.
 *
 * @param forest - Top-level pages of the book
 * @param startId - First page to push forward
 * @param offset - Number of free slots to open before the start page; 0 only tidies the sequence
 */
export function analyzeRenumber(forest: readonly Page[], startId: number, offset = 1): RenumberOutcome {
  if (!Number.isSafeInteger(offset) || offset < 0) {
    return {
      ok: false,
      reason: 'invalidOffset',
      message: `Offset must be a non-negative integer, got ${offset}`,
      entries: [],
    }
  }

  const location = locateSiblings(forest, startId)
  if (!location) {
    return { ok: false, reason: 'notFound', message: `Page ${startId} was not found in the book`, entries: [] }
  }

  const { siblings, index } = location
  const startingPoint = findStartingPoint(siblings, index, offset)
  if (!startingPoint || startingPoint.last < 0) {
    return {
      ok: false,
      reason: 'unparsableNumber',
      message: `Page ${startId} has no section number to renumber from`,
      entries: [],
    }
  }

  const entries: PlanEntry[] = []
  let current = startingPoint.last

  for (const sibling of siblings.slice(index)) {
    const oldNumber = getPageNumber(sibling.title)
    if (oldNumber === undefined) {
      // Unnumbered siblings keep their title and do not take a slot
      continue
    }

    const newNumber = joinNumber(startingPoint.prefix, current)
    current += 1

    if (newNumber !== oldNumber) {
      entries.push({ pageId: sibling.id, title: sibling.title, oldNumber, newNumber })
    }
    entries.push(...planDescendants(sibling, oldNumber, newNumber))
  }

  if (entries.length === 0) {
    return { ok: false, reason: 'noOp', message: 'All section numbers already match the plan', entries }
  }

  return { ok: true, entries }
}

/**
 * Plans a renumbering starting at `startId`.
 *
 * @returns Entries in document order, each moved sibling followed by its
 *   descendants; empty when there is nothing to renumber
 *
 * @example
 * ```typescript
 * // Siblings "5.1 Intro", "5.2 Setup", "5.3 Usage"
 * planRenumber(pages, setupId)
 * // [{ oldNumber: '5.2', newNumber: '5.3', ... }, { oldNumber: '5.3', newNumber: '5.4', ... }]
 * ```
 */
export function planRenumber(forest: readonly Page[], startId: number, offset = 1): PlanEntry[] {
  return analyzeRenumber(forest, startId, offset).entries
}
