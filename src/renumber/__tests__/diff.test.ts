import { describe, it, expect } from 'vitest'
import { makeDiff } from '../diff.js'

describe('makeDiff', () => {
  it('returns an empty string for identical texts', () => {
    expect(makeDiff('# 5.2 Same\n', '# 5.2 Same\n', 'page 1')).toBe('')
  })

  it('shows removed and added lines with labelled headers', () => {
    const lines = makeDiff('# 5.2. Title\nbody\n', '# 5.3. Title\nbody\n', 'page 1').split('\n')

    expect(lines.some((line) => line.startsWith('--- Original page 1'))).toBe(true)
    expect(lines.some((line) => line.startsWith('+++ Modified page 1'))).toBe(true)
    expect(lines).toContain('-# 5.2. Title')
    expect(lines).toContain('+# 5.3. Title')
    expect(lines).toContain(' body')
  })

  it('does not report a missing final newline', () => {
    const output = makeDiff('a\nb', 'a\nc', 'text')

    expect(output).not.toContain('No newline at end of file')
    expect(output.split('\n')).toContain('+c')
  })
})
