import { MembershipLevel, OrganizationMembership, OrgUser } from '@tenantry/core';
import { OrgStore, UserContext } from '../db/store';
import { NotFoundError, PermissionDeniedError } from '../errors';
import { logger } from '../logger';
import { deleteMembership } from './consistency';

export function applyUserContext(user: OrgUser, context: UserContext): void {
  user.currentOrganizationId = context.currentOrganizationId;
  user.currentTeamId = context.currentTeamId;
}

export class MembershipManager {
  constructor(private store: OrgStore) {}

  async getMembership(orgId: string, userId: string): Promise<OrganizationMembership | null> {
    return this.store.findMembership(orgId, userId);
  }

  async listMembers(orgId: string): Promise<OrganizationMembership[]> {
    return this.store.listMemberships(orgId);
  }

  /**
   * Checks whether `actor` may edit `target`, and when `newLevel` is given,
   * whether it may set that level.
   *
   * Granting OWNER is an ownership transfer: the actor is demoted to ADMIN
   * and that change is persisted before this resolves. A denial leaves the
   * actor untouched.
   */
  async validateUpdate(
    actor: OrganizationMembership,
    target: OrganizationMembership,
    newLevel?: MembershipLevel
  ): Promise<void> {
    await this.store.transaction(tx => this.checkUpdate(tx, actor, target, newLevel));
  }

  /** Validates and applies a level change in one transaction. */
  async updateLevel(
    actor: OrganizationMembership,
    targetId: string,
    newLevel: MembershipLevel
  ): Promise<OrganizationMembership> {
    return this.store.transaction(async tx => {
      const target = await tx.getMembership(targetId);
      if (!target) throw new NotFoundError('Membership', targetId);

      await this.checkUpdate(tx, actor, target, newLevel);

      const updated = await tx.updateMembershipLevel(target.id, newLevel);
      if (!updated) throw new NotFoundError('Membership', targetId);

      if (newLevel === MembershipLevel.OWNER) {
        logger.info('membership.ownership_transferred', {
          orgId: target.orgId,
          fromUserId: actor.userId,
          toUserId: target.userId,
        });
      }
      return updated;
    });
  }

  /** Members may always leave; removing someone else needs edit rights over them. */
  async removeMembership(actor: OrganizationMembership, targetId: string): Promise<void> {
    await this.store.transaction(async tx => {
      const target = await tx.getMembership(targetId);
      if (!target) throw new NotFoundError('Membership', targetId);

      if (target.id !== actor.id) {
        await this.checkUpdate(tx, actor, target);
      }
      await deleteMembership(tx, target);
      logger.info('membership.removed', { orgId: target.orgId, userId: target.userId, by: actor.userId });
    });
  }

  /**
   * Adds the user to the organization and makes it their current context.
   * `user` is updated only once the membership is committed.
   */
  async joinOrganization(
    user: OrgUser,
    orgId: string,
    level: MembershipLevel = MembershipLevel.MEMBER
  ): Promise<OrganizationMembership> {
    const { membership, context } = await this.store.transaction(tx => this.addMember(tx, user, orgId, level));
    applyUserContext(user, context);
    return membership;
  }

  /**
   * Persists a join inside the caller's transaction. The caller applies the
   * returned context to its user after committing.
   */
  async addMember(
    store: OrgStore,
    user: OrgUser,
    orgId: string,
    level: MembershipLevel
  ): Promise<{ membership: OrganizationMembership; context: UserContext }> {
    const membership = await store.insertMembership(orgId, user.id, level);
    const team = await store.getFirstTeam(orgId);
    const context = { currentOrganizationId: orgId, currentTeamId: team ? team.id : null };
    await store.updateUserContext(user.id, context);
    return { membership, context };
  }

  private async checkUpdate(
    store: OrgStore,
    actor: OrganizationMembership,
    target: OrganizationMembership,
    newLevel?: MembershipLevel
  ): Promise<void> {
    let demoted: OrganizationMembership | null = null;

    if (newLevel !== undefined) {
      if (target.id === actor.id) {
        throw new PermissionDeniedError("You can't change your own access level.");
      }
      if (newLevel === MembershipLevel.OWNER) {
        if (actor.level !== MembershipLevel.OWNER) {
          throw new PermissionDeniedError("You can only pass on organization ownership if you're its owner.");
        }
        demoted = await store.updateMembershipLevel(actor.id, MembershipLevel.ADMIN);
        if (!demoted) throw new NotFoundError('Membership', actor.id);
      } else if (newLevel > actor.level) {
        throw new PermissionDeniedError(
          'You can only change access level of others to lower or equal to your current one.'
        );
      }
    }

    const actorLevel = demoted ? demoted.level : actor.level;
    if (target.id !== actor.id) {
      if (target.orgId !== actor.orgId) {
        throw new PermissionDeniedError('You both need to belong to the same organization.');
      }
      if (actorLevel < MembershipLevel.ADMIN) {
        throw new PermissionDeniedError('You can only edit others if you are an admin.');
      }
      if (target.level > actorLevel) {
        throw new PermissionDeniedError('You can only edit others with level lower or equal to you.');
      }
    }

    if (demoted) {
      actor.level = demoted.level;
      actor.updatedAt = demoted.updatedAt;
    }
  }
}
