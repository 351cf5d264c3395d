import {
  MembershipLevel,
  Organization,
  OrganizationFields,
  OrganizationInvite,
  OrganizationMembership,
  OrgTeam,
  OrgUser,
  TeamFields,
} from '@tenantry/core';

export interface UserContext {
  currentOrganizationId: string | null;
  currentTeamId: string | null;
}

export interface NewInvite {
  orgId: string;
  targetEmail: string | null;
  firstName: string;
  createdById: string | null;
}

/**
 * Persistence boundary for organizations and everything they own.
 * Implementations enforce `unique_organization_membership` and
 * `only_one_owner_per_organization` themselves and report violations as
 * `ConflictError`.
 */
export interface OrgStore {
  /** Runs `fn` atomically. Calls made inside an open transaction join it. */
  transaction<T>(fn: (tx: OrgStore) => Promise<T>): Promise<T>;

  // ---- Organizations ----
  insertOrganization(fields: OrganizationFields): Promise<Organization>;
  getOrganization(orgId: string): Promise<Organization | null>;
  setOnboardingCompleted(orgId: string, completed: boolean): Promise<Organization | null>;
  /** Deletes the organization; its teams, invites and memberships go with it. */
  deleteOrganization(orgId: string): Promise<void>;

  // ---- Teams ----
  insertTeam(orgId: string, fields: TeamFields): Promise<OrgTeam>;
  getTeam(teamId: string): Promise<OrgTeam | null>;
  getFirstTeam(orgId: string): Promise<OrgTeam | null>;

  // ---- Users ----
  getUser(userId: string): Promise<OrgUser | null>;
  updateUserContext(userId: string, context: UserContext): Promise<void>;

  // ---- Memberships ----
  insertMembership(orgId: string, userId: string, level: MembershipLevel): Promise<OrganizationMembership>;
  getMembership(membershipId: string): Promise<OrganizationMembership | null>;
  findMembership(orgId: string, userId: string): Promise<OrganizationMembership | null>;
  listMemberships(orgId: string): Promise<OrganizationMembership[]>;
  hasMemberWithEmail(orgId: string, email: string): Promise<boolean>;
  updateMembershipLevel(membershipId: string, level: MembershipLevel): Promise<OrganizationMembership | null>;
  deleteMembershipRow(membershipId: string): Promise<void>;

  // ---- Invites ----
  insertInvite(invite: NewInvite): Promise<OrganizationInvite>;
  getInvite(inviteId: string): Promise<OrganizationInvite | null>;
  listInvitesCreatedAfter(orgId: string, since: Date): Promise<OrganizationInvite[]>;
  markEmailingAttempt(inviteId: string): Promise<OrganizationInvite | null>;
  deleteInvite(inviteId: string): Promise<void>;
  /** Case-insensitive match on target email across all organizations. */
  deleteInvitesByEmail(email: string): Promise<number>;
}
