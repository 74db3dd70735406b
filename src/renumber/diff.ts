import { createTwoFilesPatch } from 'diff'

/**
 * Renders a unified diff of two texts for review before anything is written.
 *
 * @param original - Text before the change
 * @param modified - Text after the change
 * @param label - Name shown in the `---` and `+++` headers
 * @returns The diff, or an empty string when the texts are identical
 */
export function makeDiff(original: string, modified: string, label: string): string {
  if (original === modified) {
    return ''
  }
  return createTwoFilesPatch(`Original ${label}`, `Modified ${label}`, withTrailingNewline(original), withTrailingNewline(modified))
}

function withTrailingNewline(text: string): string {
  return text.endsWith('\n') ? text : `${text}\n`
}
