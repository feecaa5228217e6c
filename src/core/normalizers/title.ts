import type { CellValue } from '../../types/record'
import { DEFAULT_TITLE_VOCABULARY } from '../../types/config'
import { cleanString } from './basic'

/**
 * Maps a salutation to its canonical punctuated form.
 *
 * Only spellings present in the vocabulary are recognised; everything else,
 * including blanks, maps to `''`.
 *
 * @example
 * ```typescript
 * normalizeTitle('Mrs')       // 'Mrs.'
 * normalizeTitle(' Dr. ')     // 'Dr.'
 * normalizeTitle('Professor') // ''
 * ```
 */
export function normalizeTitle(
  value: CellValue,
  vocabulary: Readonly<Record<string, string>> = DEFAULT_TITLE_VOCABULARY
): string {
  const title = cleanString(value)
  if (!title || !Object.hasOwn(vocabulary, title)) return ''
  return vocabulary[title]
}
