/**
 * Test fixtures for books and page forests.
 */

import type { Book, Page } from '../types/book.js'

/**
 * Creates a page with sensible defaults. Parent ids and depths are filled in by
 * {@link createTestForest}.
 */
export function createTestPage(id: number, title: string, children: Page[] = [], body = ''): Page {
  return {
    id,
    title,
    body,
    parentId: null,
    depth: 0,
    seq: 0,
    isOpen: true,
    children,
  }
}

/**
 * Links a forest: sets parentId, depth and seq from tree position.
 */
export function createTestForest(pages: Page[]): Page[] {
  const link = (siblings: Page[], parent: Page | undefined, depth: number): void => {
    siblings.forEach((page, seq) => {
      page.parentId = parent ? parent.id : null
      page.depth = depth
      page.seq = seq
      link(page.children, page, depth + 1)
    })
  }
  link(pages, undefined, 0)
  return pages
}

/**
 * Creates a book around a forest.
 */
export function createTestBook(pages: Page[], overrides: Partial<Omit<Book, 'pages'>> = {}): Book {
  return {
    id: 7,
    title: 'Test Book',
    summary: 'A book for tests',
    ...overrides,
    pages: createTestForest(pages),
  }
}

/**
 * A small book used across tests:
 *
 * ```
 * 100 "5. Tools"
 *   101 "5.1 Intro"
 *   102 "5.2 Setup"
 *     103 "5.2.1 Requirements"
 *       104 "5.2.1.1 Disk space"
 *     105 "5.2.2 Install"
 *   106 "5.3 Usage"
 *     107 "5.3.1 Commands"
 * 200 "6. Appendix"
 *   201 "6.1 Glossary"
 * ```
 */
export function createChapterForest(): Page[] {
  return createTestForest([
    createTestPage(100, '5. Tools', [
      createTestPage(101, '5.1 Intro'),
      createTestPage(102, '5.2 Setup', [
        createTestPage(103, '5.2.1 Requirements', [createTestPage(104, '5.2.1.1 Disk space')]),
        createTestPage(105, '5.2.2 Install'),
      ]),
      createTestPage(106, '5.3 Usage', [createTestPage(107, '5.3.1 Commands')]),
    ]),
    createTestPage(200, '6. Appendix', [createTestPage(201, '6.1 Glossary')]),
  ])
}
