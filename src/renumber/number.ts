/**
 * Dotted section numbers: parsing, arithmetic and the prefix boundary rule.
 *
 * A number such as `"5.2"` only matches at the start of a text when the next
 * character is not a digit, so `"5.2"` matches `"5.2. Setup"` and `"5.2.1"`
 * but never `"5.20"`. Every lookup of a number inside a title or heading goes
 * through {@link numberPattern} or {@link startsWithNumber}.
 */

import type { DottedNumber } from '../types/book.js'

const LEADING_NUMBER = /^\d+(?:\.\d+)*/
const DIGIT = /\d/

/**
 * Escapes a literal string for use inside a regular expression.
 */
function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

/**
 * Regular expression source that matches `number` followed by a prefix boundary.
 *
 * @param number - Dotted number to match literally
 * @returns Pattern source without anchors or flags
 */
export function numberPattern(number: DottedNumber): string {
  return `${escapeRegExp(number)}(?!\\d)`
}

/**
 * Whether `text` begins with `number` at a prefix boundary.
 */
export function startsWithNumber(text: string, number: DottedNumber): boolean {
  if (number === '' || !text.startsWith(number)) {
    return false
  }
  const next = text.charAt(number.length)
  return next === '' || !DIGIT.test(next)
}

/**
 * Extracts the dotted section number at the start of a page title.
 *
 * @param title - Page title, leading and trailing whitespace ignored
 * @returns The number, or undefined when the title does not start with a digit
 *
 * @example
 * ```typescript
 * getPageNumber('5.2. Installation') // '5.2'
 * getPageNumber('10th chapter') // '10'
 * getPageNumber('Preface') // undefined
 * ```
 */
export function getPageNumber(title: string): DottedNumber | undefined {
  return LEADING_NUMBER.exec(title.trim())?.[0]
}

/**
 * Splits a dotted number into its prefix components and its last component.
 *
 * @returns undefined when the last component is not a non-negative safe integer
 */
export function splitLast(number: DottedNumber): { prefix: string[]; last: number } | undefined {
  const parts = number.split('.')
  const lastPart = parts.pop()
  if (lastPart === undefined || !/^\d+$/.test(lastPart)) {
    return undefined
  }
  const last = Number(lastPart)
  if (!Number.isSafeInteger(last)) {
    return undefined
  }
  return { prefix: parts, last }
}

/**
 * Joins prefix components and a last component into a dotted number.
 */
export function joinNumber(prefix: readonly string[], last: number): DottedNumber {
  return [...prefix, String(last)].join('.')
}

/**
 * Adds `offset` to the last component of a dotted number.
 *
 * @returns The new number, or undefined ("cannot renumber") when the last
 *   component is not an integer or the result would be negative
 *
 * @example
 * ```typescript
 * incrementLast('5.9', 1) // '5.10'
 * incrementLast('5.x', 1) // undefined
 * ```
 */
export function incrementLast(number: DottedNumber, offset: number): DottedNumber | undefined {
  const split = splitLast(number)
  if (!split || !Number.isSafeInteger(offset) || split.last + offset < 0) {
    return undefined
  }
  return joinNumber(split.prefix, split.last + offset)
}

/**
 * Moves a descendant number from one parent prefix to another.
 *
 * Only a textual prefix followed by a period counts, so `"5.20"` is never
 * treated as a child of `"5.2"`.
 *
 * @example
 * ```typescript
 * replacePrefix('5.2.1.1', '5.2', '5.3') // '5.3.1.1'
 * replacePrefix('5.20', '5.2', '5.3') // '5.20'
 * ```
 */
export function replacePrefix(number: DottedNumber, oldPrefix: DottedNumber, newPrefix: DottedNumber): DottedNumber {
  if (oldPrefix === '' || !number.startsWith(`${oldPrefix}.`)) {
    return number
  }
  return newPrefix + number.slice(oldPrefix.length)
}
