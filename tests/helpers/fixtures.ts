import type { Topic } from '../../src/db/schema/topics.js'
import type { Post } from '../../src/db/schema/posts.js'
import type { TopicSettings } from '../../src/config/env.js'
import type { ActingUser } from '../../src/auth/guardian.js'

const CREATED = new Date('2026-01-10T10:00:00.000Z')

export function buildTopic(overrides: Partial<Topic> = {}): Topic {
  return {
    id: 1,
    title: 'How do I configure backups?',
    slug: 'how-do-i-configure-backups',
    categoryId: null,
    userId: 1,
    lastPostUserId: 1,
    lastPostedAt: CREATED,
    highestPostNumber: 1,
    postsCount: 1,
    replyCount: 0,
    featuredUser1Id: null,
    featuredUser2Id: null,
    featuredUser3Id: null,
    featuredUser4Id: null,
    avgTime: null,
    views: 0,
    likeCount: 0,
    offTopicCount: 0,
    bookmarkCount: 0,
    spamCount: 0,
    illegalCount: 0,
    inappropriateCount: 0,
    notifyModeratorsCount: 0,
    notifyUserCount: 0,
    voteCount: 0,
    starCount: 0,
    moderatorPostsCount: 0,
    visible: true,
    closed: false,
    archived: false,
    pinnedAt: null,
    bumpedAt: CREATED,
    archetype: 'regular',
    autoCloseAt: null,
    autoCloseUserId: null,
    deletedAt: null,
    createdAt: CREATED,
    updatedAt: CREATED,
    ...overrides,
  }
}

export function buildPost(overrides: Partial<Post> = {}): Post {
  return {
    id: 100,
    topicId: 1,
    userId: 1,
    postNumber: 1,
    sortOrder: 1,
    raw: 'First post body',
    postType: 'regular',
    replyToPostNumber: null,
    avgTime: null,
    likeCount: 0,
    offTopicCount: 0,
    bookmarkCount: 0,
    spamCount: 0,
    illegalCount: 0,
    inappropriateCount: 0,
    notifyModeratorsCount: 0,
    notifyUserCount: 0,
    voteCount: 0,
    deletedAt: null,
    createdAt: CREATED,
    updatedAt: CREATED,
    ...overrides,
  }
}

export function buildUser(overrides: Partial<ActingUser> = {}): ActingUser {
  return { id: 1, username: 'alice', admin: false, moderator: false, ...overrides }
}

export const testSettings: TopicSettings = {
  titleMinLength: 15,
  titleMaxLength: 255,
  allowDuplicateTitles: false,
  maxTopicsPerDay: 20,
  maxPrivateMessagesPerDay: 20,
  maxStarsPerDay: 20,
  categoryFeaturedTopics: 6,
  systemUserId: -1,
  baseUrl: 'https://forum.example.com',
}
