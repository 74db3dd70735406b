/**
 * Applies one renumbering to a page's title and headings.
 */

import type { DottedNumber } from '../types/book.js'
import { numberPattern, startsWithNumber } from './number.js'

/**
 * Title and body after a renumbering.
 */
export interface PatchedText {
  title: string
  body: string
  /** True when the title or at least one heading changed. */
  changed: boolean
}

/**
 * Rewrites `oldNumber` to `newNumber` in a page title and its markdown headings.
 *
 * Only the start of the title and the start of heading lines (`#` through any
 * depth) are rewritten. Prose that merely mentions the number, such as
 * "see 5.2.2", is left alone. Applying the same patch twice changes nothing
 * the second time.
 *
 * @example
 * ```typescript
 * applyRenumbering('5.2. Setup', '# 5.2. Setup\nsee 5.2.1', '5.2', '5.3')
 * // { title: '5.3. Setup', body: '# 5.3. Setup\nsee 5.2.1', changed: true }
 * ```
 */
export function applyRenumbering(
  title: string,
  body: string,
  oldNumber: DottedNumber,
  newNumber: DottedNumber
): PatchedText {
  if (oldNumber === '' || oldNumber === newNumber) {
    return { title, body, changed: false }
  }

  let newTitle = title
  const trimmedTitle = title.trim()
  if (startsWithNumber(trimmedTitle, oldNumber)) {
    newTitle = newNumber + trimmedTitle.slice(oldNumber.length)
  }

  const heading = new RegExp(`^(#+[ \\t]+)${numberPattern(oldNumber)}`, 'gm')
  const newBody = body.replace(heading, (_match, marker: string) => marker + newNumber)

  return {
    title: newTitle,
    body: newBody,
    changed: newTitle !== title || newBody !== body,
  }
}
