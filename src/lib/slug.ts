const MAX_SLUG_LENGTH = 80

/** Fallback for titles that contain no sluggable characters. */
export const DEFAULT_SLUG = 'topic'

export function generateSlug(title: string): string {
  const slug = title
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-|-$/g, '')
    .slice(0, MAX_SLUG_LENGTH)
    .replace(/-$/, '')

  return slug.length > 0 ? slug : DEFAULT_SLUG
}
