/**
 * Read-only queries over a book's page forest.
 *
 * All traversals are pre-order and follow the declared child order, which is
 * the order pages appear in the book.
 */

import type { Page } from '../types/book.js'

/**
 * Where a page sits among its siblings.
 */
export interface SiblingLocation {
  /** The parent page, or undefined when the page is top level. */
  parent: Page | undefined

  /** The ordered list holding the page: the parent's children, or the forest itself. */
  siblings: readonly Page[]

  /** Zero-based index of the page within `siblings`. */
  index: number
}

/**
 * Finds the sibling list that holds a page.
 *
 * @param forest - Top-level pages of the book
 * @param targetId - Identifier of the page to find
 * @returns The location, or undefined when the page is not in the forest
 */
export function locateSiblings(forest: readonly Page[], targetId: number): SiblingLocation | undefined {
  const search = (parent: Page | undefined, siblings: readonly Page[]): SiblingLocation | undefined => {
    for (const [index, page] of siblings.entries()) {
      if (page.id === targetId) {
        return { parent, siblings, index }
      }
      const found = search(page, page.children)
      if (found) {
        return found
      }
    }
    return undefined
  }

  return search(undefined, forest)
}

/**
 * Finds the immediate parent of a page.
 *
 * @returns The parent, or undefined when the page is top level or absent
 */
export function findParent(forest: readonly Page[], targetId: number): Page | undefined {
  return locateSiblings(forest, targetId)?.parent
}

/**
 * Yields a page and then every descendant, pre-order.
 */
export function* walkSubtree(page: Page): Generator<Page, void, undefined> {
  yield page
  for (const child of page.children) {
    yield* walkSubtree(child)
  }
}

/**
 * Yields every page of the forest in document order.
 */
export function* walkForest(forest: readonly Page[]): Generator<Page, void, undefined> {
  for (const page of forest) {
    yield* walkSubtree(page)
  }
}

/**
 * Returns every page of the forest in document order.
 */
export function flattenPages(forest: readonly Page[]): Page[] {
  return Array.from(walkForest(forest))
}

/**
 * Finds a page anywhere in the forest.
 */
export function findPage(forest: readonly Page[], pageId: number): Page | undefined {
  for (const page of walkForest(forest)) {
    if (page.id === pageId) {
      return page
    }
  }
  return undefined
}

/**
 * Collects the pages a renumbering starting at `startId` can touch.
 *
 * The result is the start page and each later sibling, each immediately
 * followed by its whole subtree. Earlier siblings and pages under other
 * parents are never included.
 *
 * @returns Pages in document order, or an empty list when `startId` is absent
 */
export function collectTargets(forest: readonly Page[], startId: number): Page[] {
  const location = locateSiblings(forest, startId)
  if (!location) {
    return []
  }

  return location.siblings.slice(location.index).flatMap((sibling) => Array.from(walkSubtree(sibling)))
}
