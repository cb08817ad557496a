/** Path of a topic, pointing at a post when postNumber > 1. */
export function relativeTopicUrl(slug: string, topicId: number, postNumber?: number): string {
  const base = `/t/${slug}/${String(topicId)}`
  return postNumber !== undefined && postNumber > 1 ? `${base}/${String(postNumber)}` : base
}

export function topicUrl(baseUrl: string, slug: string, topicId: number, postNumber?: number): string {
  return `${baseUrl}${relativeTopicUrl(slug, topicId, postNumber)}`
}

/** Link to the newest post, as used by topic lists. */
export function lastPostUrl(slug: string, topicId: number, postsCount: number): string {
  return `/t/${slug}/${String(topicId)}/${String(postsCount)}`
}
