export { users } from './users.js'
export { categories } from './categories.js'
export { categoryFeaturedTopics } from './category-featured-topics.js'
export { topics } from './topics.js'
export { posts } from './posts.js'
export { topicUsers } from './topic-users.js'
export { topicAllowedUsers } from './topic-allowed-users.js'
export { invites } from './invites.js'
export { topicInvites } from './topic-invites.js'
export { notifications } from './notifications.js'
