import { OrganizationMembership } from '@tenantry/core';
import { OrgStore } from '../db/store';
import { logger } from '../logger';

/**
 * The only way a membership row is removed. Before deleting, clears the
 * user's current organization/team when they point into the organization
 * being left.
 */
export async function deleteMembership(store: OrgStore, membership: OrganizationMembership): Promise<void> {
  const user = await store.getUser(membership.userId);
  if (user) {
    let currentOrganizationId = user.currentOrganizationId;
    let currentTeamId = user.currentTeamId;

    if (currentOrganizationId === membership.orgId) {
      currentOrganizationId = null;
    }
    if (currentTeamId !== null) {
      const team = await store.getTeam(currentTeamId);
      if (team?.orgId === membership.orgId) {
        currentTeamId = null;
      }
    }

    if (currentOrganizationId !== user.currentOrganizationId || currentTeamId !== user.currentTeamId) {
      await store.updateUserContext(user.id, { currentOrganizationId, currentTeamId });
      logger.info('user.context.reset', { userId: user.id, orgId: membership.orgId });
    }
  }

  await store.deleteMembershipRow(membership.id);
}
