import { Injectable, Inject, Logger } from '@nestjs/common';
import { eq, and } from 'drizzle-orm';
import { projectUsers, users } from '@crewdesk/db';
import type { Database } from '@crewdesk/db';
import { DRIZZLE } from '../providers/drizzle.provider';
import { isPgUniqueViolation, pgConstraintName } from '../utils/pg-errors';
import { InsufficientPermissionsException } from '../exceptions/insufficient-permissions.exception';
import { UserNotFoundException } from '../users/exceptions/user-not-found.exception';
import { AlreadyMemberException } from './exceptions/already-member.exception';
import { OwnerAlreadyAssignedException } from './exceptions/owner-already-assigned.exception';

const SINGLE_OWNER_INDEX = 'project_users_single_owner_idx';

const MEMBER_COLUMNS = {
  id: projectUsers.id,
  is_owner: projectUsers.is_owner,
  user: {
    id: users.id,
    email: users.email,
    name: users.name,
  },
};

export interface Membership {
  id: number;
  is_owner: boolean;
}

export interface MemberView {
  id: number;
  is_owner: boolean;
  user: { id: number; email: string; name: string };
}

/**
 * The user/project relation. Every method takes an optional `db` so callers
 * can run it inside their own transaction.
 */
@Injectable()
export class MembersService {
  private readonly logger = new Logger(MembersService.name);

  constructor(
    @Inject(DRIZZLE) private readonly db: Database,
  ) {}

  async getMembership(userId: number, projectId: number, db: Database = this.db): Promise<Membership | null> {
    const [membership] = await db
      .select({ id: projectUsers.id, is_owner: projectUsers.is_owner })
      .from(projectUsers)
      .where(and(eq(projectUsers.user_id, userId), eq(projectUsers.project_id, projectId)))
      .limit(1);
    return membership ?? null;
  }

  async addMember(projectId: number, userId: number, isOwner: boolean, db: Database = this.db): Promise<Membership> {
    if (isOwner) {
      const [owner] = await db
        .select({ id: projectUsers.id })
        .from(projectUsers)
        .where(and(eq(projectUsers.project_id, projectId), eq(projectUsers.is_owner, true)))
        .limit(1);
      if (owner) {throw new OwnerAlreadyAssignedException();}
    }

    let created: Membership;
    try {
      [created] = await db
        .insert(projectUsers)
        .values({ project_id: projectId, user_id: userId, is_owner: isOwner })
        .returning({ id: projectUsers.id, is_owner: projectUsers.is_owner });
    } catch (err) {
      // A concurrent insert can slip past the owner pre-check.
      if (isPgUniqueViolation(err)) {
        throw pgConstraintName(err) === SINGLE_OWNER_INDEX
          ? new OwnerAlreadyAssignedException()
          : new AlreadyMemberException();
      }
      throw err;
    }

    this.logger.log({ projectId, userId, isOwner }, 'Member added');
    return created;
  }

  async removeAllForProject(projectId: number, db: Database = this.db): Promise<number> {
    const removed = await db
      .delete(projectUsers)
      .where(eq(projectUsers.project_id, projectId))
      .returning({ id: projectUsers.id });
    return removed.length;
  }

  async membersOf(projectId: number): Promise<MemberView[]> {
    return this.db
      .select(MEMBER_COLUMNS)
      .from(projectUsers)
      .innerJoin(users, eq(projectUsers.user_id, users.id))
      .where(eq(projectUsers.project_id, projectId))
      .orderBy(projectUsers.id);
  }

  /**
   * Adds the user registered under `email` as a plain member. Only the
   * project owner may invite.
   */
  async invite(inviterId: number, projectId: number, email: string): Promise<MemberView> {
    const membership = await this.db.transaction(async (tx) => {
      const inviter = await this.getMembership(inviterId, projectId, tx);
      if (!inviter?.is_owner) {
        throw new InsufficientPermissionsException('Only the project owner can invite members');
      }

      const [target] = await tx
        .select({ id: users.id, email: users.email, name: users.name })
        .from(users)
        .where(eq(users.email, email))
        .limit(1);
      if (!target) {throw new UserNotFoundException();}

      if (await this.getMembership(target.id, projectId, tx)) {
        throw new AlreadyMemberException();
      }

      const created = await this.addMember(projectId, target.id, false, tx);
      return { id: created.id, is_owner: created.is_owner, user: target };
    });

    this.logger.log({ projectId, inviterId, memberId: membership.user.id }, 'Member invited');
    return membership;
  }
}
