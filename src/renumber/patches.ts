/**
 * Turns a renumbering plan into reviewable per-page patches.
 */

import type { DottedNumber, Page } from '../types/book.js'
import { makeDiff } from './diff.js'
import { applyRenumbering } from './patcher.js'
import type { PlanEntry } from './planner.js'
import { findPage } from './tree.js'

/**
 * Title and body of a page.
 */
export interface PageText {
  title: string
  body: string
}

/**
 * The effect of one plan entry on its page.
 */
export interface PagePatch {
  pageId: number
  oldNumber: DottedNumber
  newNumber: DottedNumber
  before: PageText
  after: PageText
  changed: boolean
  /** True when the page is no longer in the forest; nothing is patched. */
  missing: boolean
  /** Unified diff of title and body, empty when unchanged. */
  diff: string
  /** Parent and visibility of the page, needed to write it back. Absent when missing. */
  placement?: PagePlacement
}

/**
 * Fields of a page that a renumbering keeps as they are.
 */
export interface PagePlacement {
  parentId: number | null
  isOpen: boolean
}

/**
 * Renders a page as the text its diff is computed over: the title line, a
 * blank line, then the body.
 */
function renderPage(text: PageText): string {
  return `${text.title}\n\n${text.body}`
}

/**
 * Applies every plan entry to its page, keyed by page id.
 *
 * @param forest - The forest the plan was computed from
 * @param plan - Entries from {@link planRenumber}
 */
export function buildRenumberPatches(forest: readonly Page[], plan: readonly PlanEntry[]): PagePatch[] {
  return plan.map((entry) => {
    const page = findPage(forest, entry.pageId)
    if (!page) {
      const text = { title: entry.title, body: '' }
      return {
        pageId: entry.pageId,
        oldNumber: entry.oldNumber,
        newNumber: entry.newNumber,
        before: text,
        after: text,
        changed: false,
        missing: true,
        diff: '',
      }
    }

    const before = { title: page.title, body: page.body }
    const patched = applyRenumbering(page.title, page.body, entry.oldNumber, entry.newNumber)
    const after = { title: patched.title, body: patched.body }

    return {
      pageId: entry.pageId,
      oldNumber: entry.oldNumber,
      newNumber: entry.newNumber,
      before,
      after,
      changed: patched.changed,
      missing: false,
      diff: makeDiff(renderPage(before), renderPage(after), `page ${page.id}`),
      placement: { parentId: page.parentId, isOpen: page.isOpen },
    }
  })
}
