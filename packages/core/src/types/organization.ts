export const MembershipLevel = {
  MEMBER: 1,
  ADMIN: 8,
  OWNER: 15,
} as const;
export type MembershipLevel = (typeof MembershipLevel)[keyof typeof MembershipLevel];

const LEVEL_LABELS: Record<MembershipLevel, string> = {
  [MembershipLevel.MEMBER]: 'member',
  [MembershipLevel.ADMIN]: 'administrator',
  [MembershipLevel.OWNER]: 'owner',
};

export function membershipLevelLabel(level: MembershipLevel): string {
  return LEVEL_LABELS[level];
}

export function isMembershipLevel(value: number): value is MembershipLevel {
  return value === MembershipLevel.MEMBER || value === MembershipLevel.ADMIN || value === MembershipLevel.OWNER;
}

export function toMembershipLevel(value: number): MembershipLevel {
  if (!isMembershipLevel(value)) {
    throw new Error(`Unknown membership level: ${value}`);
  }
  return value;
}

/** Number of days for which organization invites are valid. */
export const INVITE_DAYS_VALIDITY = 3;

export interface Organization {
  id: string;
  name: string;
  createdAt: Date;
  updatedAt: Date;
  onboardingCompleted: boolean;
  personalization: Record<string, unknown>;
}

export interface OrganizationFields {
  name: string;
  onboardingCompleted?: boolean;
  personalization?: Record<string, unknown>;
}

export interface OrgTeam {
  id: string;
  orgId: string;
  name: string;
  createdAt: Date;
}

export interface TeamFields {
  name?: string;
}

/** The slice of a user account this subsystem reads and writes. */
export interface OrgUser {
  id: string;
  email: string;
  firstName: string;
  currentOrganizationId: string | null;
  currentTeamId: string | null;
}

export interface OrganizationMembership {
  id: string;
  orgId: string;
  userId: string;
  level: MembershipLevel;
  joinedAt: Date;
  updatedAt: Date;
}

export interface OrganizationInvite {
  id: string;
  orgId: string;
  targetEmail: string | null;
  firstName: string;
  createdById: string | null;
  emailingAttemptMade: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export type InviteErrorCode =
  | 'invalid_recipient'
  | 'expired'
  | 'user_already_member'
  | 'existing_email_address';

export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};
