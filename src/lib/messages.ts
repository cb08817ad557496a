// ---------------------------------------------------------------------------
// Localized system messages (moderator posts, poster roles)
// ---------------------------------------------------------------------------

interface PluralMessage {
  one: string
  other: string
}

const MESSAGES = {
  'topic_statuses.closed_enabled': 'This topic is now closed. New replies are no longer allowed.',
  'topic_statuses.closed_disabled': 'This topic is now opened. New replies are allowed.',
  'topic_statuses.autoclosed_enabled': {
    one: 'This topic was automatically closed after 1 day. New replies are no longer allowed.',
    other:
      'This topic was automatically closed after {{count}} days. New replies are no longer allowed.',
  },
  'topic_statuses.autoclosed_disabled': 'This topic is now opened. New replies are allowed.',
  'topic_statuses.archived_enabled':
    'This topic is now archived. It is frozen and cannot be changed in any way.',
  'topic_statuses.archived_disabled':
    'This topic is now unarchived. It is no longer frozen, and can be changed.',
  'topic_statuses.pinned_enabled':
    'This topic is now pinned. It will appear at the top of its category until it is unpinned by a moderator or cleared by each user.',
  'topic_statuses.pinned_disabled':
    'This topic is now unpinned. It will no longer appear at the top of its category.',
  'topic_statuses.visible_enabled': 'This topic is now visible. It will be displayed in topic lists.',
  'topic_statuses.visible_disabled':
    'This topic is now invisible. It will no longer be displayed in any topic lists. The only way to access this topic is via direct link.',
  'move_posts.moderator_post': {
    one: 'I moved a post to a new topic: {{topicLink}}',
    other: 'I moved {{count}} posts to a new topic: {{topicLink}}',
  },
  'move_posts.existing_topic_moderator_post': {
    one: 'I moved a post to an existing topic: {{topicLink}}',
    other: 'I moved {{count}} posts to an existing topic: {{topicLink}}',
  },
  'poster.original_poster': 'Original Poster',
  'poster.most_posts': 'Most Posts',
  'poster.frequent_poster': 'Frequent Poster',
  'poster.most_recent_poster': 'Most Recent Poster',
} satisfies Record<string, string | PluralMessage>

export type MessageKey = keyof typeof MESSAGES

export type MessageParams = Record<string, string | number>

function interpolate(template: string, params: MessageParams): string {
  return template.replace(/\{\{(\w+)\}\}/g, (match, name: string) => {
    const value = params[name]
    return value === undefined ? match : String(value)
  })
}

/**
 * Render a system message. Plural messages pick their form from
 * `params.count`.
 */
export function translate(key: MessageKey, params: MessageParams = {}): string {
  const entry: string | PluralMessage = MESSAGES[key]
  if (typeof entry === 'string') {
    return interpolate(entry, params)
  }
  return interpolate(params['count'] === 1 ? entry.one : entry.other, params)
}
