import { randomBytes } from 'node:crypto'
import { and, eq } from 'drizzle-orm'
import type { Executor } from '../db/index.js'
import { topics } from '../db/schema/topics.js'
import type { Topic } from '../db/schema/topics.js'
import { invites } from '../db/schema/invites.js'
import type { Invite } from '../db/schema/invites.js'
import { topicInvites } from '../db/schema/topic-invites.js'
import { topicAllowedUsers } from '../db/schema/topic-allowed-users.js'
import type { Logger } from '../lib/logger.js'
import { invalidArgument, notFound, validationFailure } from '../lib/api-errors.js'
import { pgErrorCode, runInTransaction, UNIQUE_VIOLATION } from '../lib/transaction.js'
import { JobQueues } from '../lib/job-queue.js'
import type { JobScheduler } from '../lib/job-queue.js'
import type { ActingUser, Guardian } from '../auth/guardian.js'
import type { NotificationService } from './notification.js'

const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+$/

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type InviteResult =
  | { outcome: 'access_granted'; userId: number }
  | { outcome: 'converted_to_access_grant'; userId: number }
  | { outcome: 'invited'; invite: Invite; reused: boolean }

type InviteTopic = Pick<Topic, 'id' | 'title' | 'archetype'>

export interface InviteCoordinator {
  invite(topicId: number, invitedBy: ActingUser, identifier: string): Promise<InviteResult>
  inviteByEmail(topic: InviteTopic, invitedBy: ActingUser, email: string): Promise<InviteResult>
}

export interface InviteCoordinatorDeps {
  db: Executor
  logger: Logger
  guardian: Guardian
  jobs: JobScheduler
  notifications: NotificationService
}

export function looksLikeEmail(identifier: string): boolean {
  return EMAIL_PATTERN.test(identifier.trim())
}

export function generateInviteKey(): string {
  return randomBytes(16).toString('hex')
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createInviteCoordinator(deps: InviteCoordinatorDeps): InviteCoordinator {
  const { db, logger, guardian, jobs, notifications } = deps

  async function grantAccess(
    topic: InviteTopic,
    user: ActingUser,
    invitedBy: ActingUser
  ): Promise<void> {
    const inserted = await db
      .insert(topicAllowedUsers)
      .values({ topicId: topic.id, userId: user.id })
      .onConflictDoNothing()
      .returning({ id: topicAllowedUsers.id })

    // Already on the allow-list: nothing new to tell the user
    if (inserted.length === 0) return

    await notifications.notifyInvitedToPrivateMessage({
      userId: user.id,
      topicId: topic.id,
      topicTitle: topic.title,
      invitedByUsername: invitedBy.username,
    })
    logger.info({ topicId: topic.id, userId: user.id }, 'Granted private message access')
  }

  async function storeInvite(
    topicId: number,
    invitedById: number,
    email: string
  ): Promise<{ invite: Invite; reused: boolean }> {
    return runInTransaction(db, async (tx) => {
      const existing = await tx
        .select()
        .from(invites)
        .where(and(eq(invites.invitedById, invitedById), eq(invites.email, email)))
        .limit(1)

      let invite = existing[0]
      const reused = invite !== undefined

      if (!invite) {
        const rows = await tx
          .insert(invites)
          .values({ invitedById, email, inviteKey: generateInviteKey() })
          .returning()
        invite = rows[0]
      } else if (invite.deletedAt !== null) {
        const rows = await tx
          .update(invites)
          .set({ deletedAt: null, updatedAt: new Date() })
          .where(eq(invites.id, invite.id))
          .returning()
        invite = rows[0]
      }

      if (!invite) {
        throw new Error('Invite write returned no row')
      }

      await tx
        .insert(topicInvites)
        .values({ topicId, inviteId: invite.id })
        .onConflictDoNothing()

      return { invite, reused }
    })
  }

  async function inviteByEmail(
    topic: InviteTopic,
    invitedBy: ActingUser,
    rawEmail: string
  ): Promise<InviteResult> {
    const email = rawEmail.trim().toLowerCase()
    if (!looksLikeEmail(email)) {
      throw invalidArgument(`Not an email address: ${rawEmail}`)
    }

    const existing = await db
      .select({ id: invites.id })
      .from(invites)
      .where(and(eq(invites.invitedById, invitedBy.id), eq(invites.email, email)))
      .limit(1)

    if (existing.length === 0) {
      const registered = await guardian.findUserByEmail(email)
      if (registered) {
        if (topic.archetype === 'private_message') {
          await grantAccess(topic, registered, invitedBy)
          return { outcome: 'converted_to_access_grant', userId: registered.id }
        }
        throw validationFailure('That email address belongs to a registered user', {
          reason: 'email_taken',
        })
      }
    }

    let stored: { invite: Invite; reused: boolean }
    try {
      stored = await storeInvite(topic.id, invitedBy.id, email)
    } catch (err: unknown) {
      if (pgErrorCode(err) === UNIQUE_VIOLATION) {
        throw validationFailure('An invite for that email address already exists', {
          reason: 'duplicate_invite',
        })
      }
      throw err
    }

    try {
      await jobs.enqueue(JobQueues.INVITE_EMAIL, { inviteId: stored.invite.id })
    } catch (err: unknown) {
      logger.error({ err, inviteId: stored.invite.id }, 'Failed to queue invite email')
    }

    logger.info(
      { topicId: topic.id, inviteId: stored.invite.id, reused: stored.reused },
      'Invited by email'
    )
    return { outcome: 'invited', ...stored }
  }

  return {
    async invite(topicId, invitedBy, identifier) {
      const rows = await db
        .select({ id: topics.id, title: topics.title, archetype: topics.archetype })
        .from(topics)
        .where(eq(topics.id, topicId))
        .limit(1)
      const topic = rows[0]
      if (!topic) {
        throw notFound(`Topic ${String(topicId)} not found`)
      }

      if (topic.archetype === 'private_message') {
        const user = await guardian.findUserByUsernameOrEmail(identifier)
        if (user) {
          await grantAccess(topic, user, invitedBy)
          return { outcome: 'access_granted', userId: user.id }
        }
      }

      if (!looksLikeEmail(identifier)) {
        throw invalidArgument(`No user or email address matches: ${identifier}`)
      }
      return inviteByEmail(topic, invitedBy, identifier)
    },

    inviteByEmail,
  }
}
