import DOMPurify from 'isomorphic-dompurify'

/**
 * Bidirectional override and mark characters to strip from all text.
 * Prevents text reordering attacks (bidi override) and invisible direction marks.
 */
const BIDI_REGEX = /[\u202A-\u202E\u2066-\u2069\u200E\u200F]/g

/**
 * Apply Unicode NFC normalization and strip bidirectional override characters.
 */
function normalizeText(input: string): string {
  return input.normalize('NFC').replace(BIDI_REGEX, '')
}

/**
 * Sanitize plain text (strip all HTML).
 * Applies NFC normalization and strips bidi override characters.
 */
export function sanitizeText(input: string): string {
  if (input === '') return ''

  const normalized = normalizeText(input)

  return DOMPurify.sanitize(normalized, {
    ALLOWED_TAGS: [],
    ALLOWED_ATTR: [],
  })
}

/**
 * Clean a topic title for storage: strip markup, collapse runs of
 * whitespace and trim.
 */
export function sanitizeTitle(input: string): string {
  return sanitizeText(input).replace(/\s+/g, ' ').trim()
}
