import { z } from 'zod';
import {
  INVITE_DAYS_VALIDITY,
  MembershipLevel,
  maskEmailAddress,
  systemClock,
  Clock,
  OrganizationInvite,
  OrganizationMembership,
  OrgUser,
} from '@tenantry/core';
import { OrgStore } from '../db/store';
import { InviteValidationError, NotFoundError, PermissionDeniedError } from '../errors';
import { logger } from '../logger';
import { MembershipManager, applyUserContext } from '../organizations/membership-manager';

const DAY_MS = 24 * 60 * 60 * 1000;

const createInviteSchema = z.object({
  targetEmail: z.string().trim().email().nullish(),
  firstName: z.string().trim().max(30).default(''),
});

export type CreateInviteInput = z.input<typeof createInviteSchema>;

export interface ValidateInviteOptions {
  user?: OrgUser | null;
  email?: string | null;
}

export interface UseInviteOptions {
  prevalidated?: boolean;
}

export interface InviteManagerOptions {
  siteUrl: string;
  clock?: Clock;
  inviteDaysValidity?: number;
}

export class InviteManager {
  private siteUrl: string;
  private clock: Clock;
  private inviteDaysValidity: number;

  constructor(
    private store: OrgStore,
    private memberships: MembershipManager,
    options: InviteManagerOptions
  ) {
    this.siteUrl = options.siteUrl.replace(/\/+$/, '');
    this.clock = options.clock ?? systemClock;
    this.inviteDaysValidity = options.inviteDaysValidity ?? INVITE_DAYS_VALIDITY;
  }

  async createInvite(actor: OrganizationMembership, input: CreateInviteInput): Promise<OrganizationInvite> {
    if (actor.level < MembershipLevel.ADMIN) {
      throw new PermissionDeniedError('You can only invite others if you are an admin.');
    }
    const fields = createInviteSchema.parse(input);
    const invite = await this.store.insertInvite({
      orgId: actor.orgId,
      targetEmail: fields.targetEmail ?? null,
      firstName: fields.firstName,
      createdById: actor.userId,
    });
    logger.info('invite.created', { inviteId: invite.id, orgId: invite.orgId, createdById: actor.userId });
    return invite;
  }

  async getInvite(inviteId: string): Promise<OrganizationInvite> {
    const invite = await this.store.getInvite(inviteId);
    if (!invite) throw new NotFoundError('Invite', inviteId);
    return invite;
  }

  async markEmailingAttempt(inviteId: string): Promise<OrganizationInvite> {
    const invite = await this.store.markEmailingAttempt(inviteId);
    if (!invite) throw new NotFoundError('Invite', inviteId);
    return invite;
  }

  inviteUrl(invite: OrganizationInvite): string {
    return `${this.siteUrl}/signup/${invite.id}`;
  }

  /** An invite expires once it is INVITE_DAYS_VALIDITY days old. */
  isExpired(invite: OrganizationInvite): boolean {
    const cutoff = this.clock.now().getTime() - this.inviteDaysValidity * DAY_MS;
    return invite.createdAt.getTime() <= cutoff;
  }

  async validate(invite: OrganizationInvite, options: ValidateInviteOptions = {}): Promise<void> {
    return this.check(this.store, invite, options);
  }

  /**
   * Redeems the invite for `user`. Every invite addressed to the same email,
   * in any organization, is deleted with it.
   */
  async use(invite: OrganizationInvite, user: OrgUser, options: UseInviteOptions = {}): Promise<OrganizationMembership> {
    const { membership, context } = await this.store.transaction(async tx => {
      if (!options.prevalidated) {
        await this.check(tx, invite, { user });
      }
      const joined = await this.memberships.addMember(tx, user, invite.orgId, MembershipLevel.MEMBER);
      if (invite.targetEmail === null) {
        await tx.deleteInvite(invite.id);
      } else {
        await tx.deleteInvitesByEmail(invite.targetEmail);
      }
      return joined;
    });
    applyUserContext(user, context);

    logger.info('invite.used', { inviteId: invite.id, orgId: invite.orgId, userId: user.id });
    return membership;
  }

  private async check(store: OrgStore, invite: OrganizationInvite, options: ValidateInviteOptions): Promise<void> {
    const { user } = options;
    const email = options.email || user?.email;

    if (email && invite.targetEmail !== null && email !== invite.targetEmail) {
      throw new InviteValidationError(
        'invalid_recipient',
        `This invite is intended for another email address: ${maskEmailAddress(invite.targetEmail)}.`
      );
    }

    if (this.isExpired(invite)) {
      throw new InviteValidationError('expired', 'This invite has expired. Please ask your admin for a new one.');
    }

    if (user && (await store.findMembership(invite.orgId, user.id))) {
      throw new InviteValidationError('user_already_member', 'You already are a member of this organization.');
    }

    if (invite.targetEmail !== null && (await store.hasMemberWithEmail(invite.orgId, invite.targetEmail))) {
      throw new InviteValidationError(
        'existing_email_address',
        'Another user with this email address already belongs to this organization.'
      );
    }
  }
}
