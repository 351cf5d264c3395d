import {
  INVITE_DAYS_VALIDITY,
  MembershipLevel,
  systemClock,
  BillingPlanDetails,
  Clock,
  Organization,
  OrganizationFields,
  OrganizationInvite,
  OrganizationMembership,
  OrgTeam,
  OrgUser,
  TeamFields,
} from '@tenantry/core';
import { FeatureResolver } from '../billing/feature-resolver';
import { OrgStore } from '../db/store';
import { NotFoundError } from '../errors';
import { logger } from '../logger';
import { deleteMembership } from './consistency';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface BootstrapOptions extends OrganizationFields {
  teamFields?: TeamFields;
}

export interface BootstrapResult {
  organization: Organization;
  membership: OrganizationMembership | null;
  team: OrgTeam;
}

export interface OrgManagerOptions {
  clock?: Clock;
  inviteDaysValidity?: number;
}

export class OrgManager {
  private clock: Clock;
  private inviteDaysValidity: number;

  constructor(
    private store: OrgStore,
    private features: FeatureResolver,
    options: OrgManagerOptions = {}
  ) {
    this.clock = options.clock ?? systemClock;
    this.inviteDaysValidity = options.inviteDaysValidity ?? INVITE_DAYS_VALIDITY;
  }

  // ---- Organizations ----

  /**
   * Creates an organization with its default team and, when a user is given,
   * makes them its owner and switches them into it. All or nothing.
   */
  async bootstrap(user: OrgUser | null, options: BootstrapOptions): Promise<BootstrapResult> {
    const { teamFields, ...organizationFields } = options;

    const result = await this.store.transaction(async tx => {
      const organization = await tx.insertOrganization(organizationFields);
      const team = await tx.insertTeam(organization.id, teamFields ?? {});
      let membership: OrganizationMembership | null = null;
      if (user) {
        membership = await tx.insertMembership(organization.id, user.id, MembershipLevel.OWNER);
        await tx.updateUserContext(user.id, {
          currentOrganizationId: organization.id,
          currentTeamId: team.id,
        });
      }
      return { organization, membership, team };
    });

    if (user) {
      user.currentOrganizationId = result.organization.id;
      user.currentTeamId = result.team.id;
    }
    logger.info('organization.bootstrapped', {
      orgId: result.organization.id,
      teamId: result.team.id,
      ownerId: user ? user.id : null,
    });
    return result;
  }

  async getOrg(orgId: string): Promise<Organization | null> {
    return this.store.getOrganization(orgId);
  }

  isOnboardingActive(org: Organization): boolean {
    return !org.onboardingCompleted;
  }

  async completeOnboarding(orgId: string): Promise<Organization> {
    const org = await this.store.setOnboardingCompleted(orgId, true);
    if (!org) throw new NotFoundError('Organization', orgId);
    return org;
  }

  /** Removes every membership through the consistency step, then the organization itself. */
  async deleteOrganization(orgId: string): Promise<void> {
    await this.store.transaction(async tx => {
      const org = await tx.getOrganization(orgId);
      if (!org) throw new NotFoundError('Organization', orgId);

      for (const membership of await tx.listMemberships(orgId)) {
        await deleteMembership(tx, membership);
      }
      await tx.deleteOrganization(orgId);
    });
    logger.info('organization.deleted', { orgId });
  }

  // ---- Invites ----

  /** Invites that have not yet expired. */
  async getActiveInvites(orgId: string): Promise<OrganizationInvite[]> {
    const since = new Date(this.clock.now().getTime() - this.inviteDaysValidity * DAY_MS);
    return this.store.listInvitesCreatedAfter(orgId, since);
  }

  // ---- Billing ----

  async getBillingPlanDetails(orgId: string): Promise<BillingPlanDetails> {
    return this.features.getPlanDetails(orgId);
  }

  async getBillingPlan(orgId: string): Promise<string | null> {
    return this.features.getBillingPlan(orgId);
  }

  async getAvailableFeatures(orgId: string): Promise<string[]> {
    return this.features.getAvailableFeatures(orgId);
  }

  async isFeatureAvailable(orgId: string, feature: string): Promise<boolean> {
    return this.features.isFeatureAvailable(orgId, feature);
  }
}
