import { beforeEach, describe, expect, it } from 'vitest';
import { MembershipLevel, Organization, OrganizationMembership } from '@tenantry/core';
import { ConflictError, MembershipManager, NotFoundError, PermissionDeniedError, setLogLevel } from '../src';
import { MemoryOrgStore, fixedClock } from './helpers/memory-store';

setLogLevel('silent');

const NOW = new Date('2024-03-01T12:00:00.000Z');

class FailingContextStore extends MemoryOrgStore {
  async updateUserContext(): Promise<void> {
    throw new Error('context write failed');
  }
}

describe('MembershipManager', () => {
  let store: MemoryOrgStore;
  let manager: MembershipManager;
  let org: Organization;

  const addMember = async (userId: string, level: MembershipLevel, orgId = org.id): Promise<OrganizationMembership> => {
    if (!store.tables.users.has(userId)) {
      store.addUser({ id: userId, email: `${userId}@example.com` });
    }
    return store.insertMembership(orgId, userId, level);
  };

  beforeEach(async () => {
    store = new MemoryOrgStore(fixedClock(NOW));
    manager = new MembershipManager(store);
    org = await store.insertOrganization({ name: 'Acme' });
    await store.insertTeam(org.id, {});
  });

  describe('validateUpdate', () => {
    it('never lets a member change their own level', async () => {
      const owner = await addMember('owner', MembershipLevel.OWNER);
      for (const level of [MembershipLevel.MEMBER, MembershipLevel.ADMIN, MembershipLevel.OWNER]) {
        await expect(manager.validateUpdate(owner, owner, level)).rejects.toThrow(
          "You can't change your own access level."
        );
      }
      expect((await store.getMembership(owner.id))?.level).toBe(MembershipLevel.OWNER);
    });

    it('lets a member edit themselves when no level is given', async () => {
      const member = await addMember('member', MembershipLevel.MEMBER);
      await expect(manager.validateUpdate(member, member)).resolves.toBeUndefined();
    });

    it('lets an admin promote a member to admin', async () => {
      const admin = await addMember('admin', MembershipLevel.ADMIN);
      const member = await addMember('member', MembershipLevel.MEMBER);
      await expect(manager.validateUpdate(admin, member, MembershipLevel.ADMIN)).resolves.toBeUndefined();
    });

    it('denies an admin granting ownership', async () => {
      const admin = await addMember('admin', MembershipLevel.ADMIN);
      const member = await addMember('member', MembershipLevel.MEMBER);
      await expect(manager.validateUpdate(admin, member, MembershipLevel.OWNER)).rejects.toThrow(
        "You can only pass on organization ownership if you're its owner."
      );
    });

    it('denies raising someone above the actor level', async () => {
      const member = await addMember('member', MembershipLevel.MEMBER);
      const other = await addMember('other', MembershipLevel.MEMBER);
      await expect(manager.validateUpdate(member, other, MembershipLevel.ADMIN)).rejects.toThrow(
        'You can only change access level of others to lower or equal to your current one.'
      );
    });

    it('denies edits across organizations', async () => {
      const otherOrg = await store.insertOrganization({ name: 'Globex' });
      const admin = await addMember('admin', MembershipLevel.ADMIN);
      const outsider = await addMember('outsider', MembershipLevel.MEMBER, otherOrg.id);
      await expect(manager.validateUpdate(admin, outsider)).rejects.toThrow(
        'You both need to belong to the same organization.'
      );
    });

    it('denies plain members editing others', async () => {
      const member = await addMember('member', MembershipLevel.MEMBER);
      const other = await addMember('other', MembershipLevel.MEMBER);
      await expect(manager.validateUpdate(member, other)).rejects.toBeInstanceOf(PermissionDeniedError);
      await expect(manager.validateUpdate(member, other)).rejects.toThrow(
        'You can only edit others if you are an admin.'
      );
    });

    it('denies an admin editing the owner', async () => {
      const owner = await addMember('owner', MembershipLevel.OWNER);
      const admin = await addMember('admin', MembershipLevel.ADMIN);
      await expect(manager.validateUpdate(admin, owner)).rejects.toThrow(
        'You can only edit others with level lower or equal to you.'
      );
    });

    it('demotes the owner to admin when ownership is granted', async () => {
      const owner = await addMember('owner', MembershipLevel.OWNER);
      const member = await addMember('member', MembershipLevel.MEMBER);

      await manager.validateUpdate(owner, member, MembershipLevel.OWNER);

      expect(owner.level).toBe(MembershipLevel.ADMIN);
      expect((await store.getMembership(owner.id))?.level).toBe(MembershipLevel.ADMIN);
    });

    it('keeps the owner when a transfer is denied later on', async () => {
      const otherOrg = await store.insertOrganization({ name: 'Globex' });
      const owner = await addMember('owner', MembershipLevel.OWNER);
      const outsider = await addMember('outsider', MembershipLevel.MEMBER, otherOrg.id);

      await expect(manager.validateUpdate(owner, outsider, MembershipLevel.OWNER)).rejects.toThrow(
        'You both need to belong to the same organization.'
      );
      expect(owner.level).toBe(MembershipLevel.OWNER);
      expect((await store.getMembership(owner.id))?.level).toBe(MembershipLevel.OWNER);
    });
  });

  describe('updateLevel', () => {
    it('transfers ownership leaving exactly one owner', async () => {
      const owner = await addMember('owner', MembershipLevel.OWNER);
      const member = await addMember('member', MembershipLevel.MEMBER);

      const updated = await manager.updateLevel(owner, member.id, MembershipLevel.OWNER);

      expect(updated.level).toBe(MembershipLevel.OWNER);
      expect((await store.getMembership(owner.id))?.level).toBe(MembershipLevel.ADMIN);
      expect(store.ownerCount(org.id)).toBe(1);
    });

    it('rejects a second transfer made with a stale owner record', async () => {
      const owner = await addMember('owner', MembershipLevel.OWNER);
      const stale = { ...owner };
      const first = await addMember('first', MembershipLevel.MEMBER);
      const second = await addMember('second', MembershipLevel.MEMBER);

      await manager.updateLevel(owner, first.id, MembershipLevel.OWNER);
      const attempt = manager.updateLevel(stale, second.id, MembershipLevel.OWNER);

      await expect(attempt).rejects.toBeInstanceOf(ConflictError);
      await expect(attempt).rejects.toMatchObject({ constraint: 'only_one_owner_per_organization' });
      expect(store.ownerCount(org.id)).toBe(1);
      expect((await store.getMembership(first.id))?.level).toBe(MembershipLevel.OWNER);
      expect((await store.getMembership(second.id))?.level).toBe(MembershipLevel.MEMBER);
    });

    it('applies a permitted downgrade', async () => {
      const owner = await addMember('owner', MembershipLevel.OWNER);
      const admin = await addMember('admin', MembershipLevel.ADMIN);

      const updated = await manager.updateLevel(owner, admin.id, MembershipLevel.MEMBER);

      expect(updated.level).toBe(MembershipLevel.MEMBER);
      expect(owner.level).toBe(MembershipLevel.OWNER);
    });

    it('fails for an unknown membership', async () => {
      const owner = await addMember('owner', MembershipLevel.OWNER);
      await expect(manager.updateLevel(owner, 'missing', MembershipLevel.ADMIN)).rejects.toBeInstanceOf(
        NotFoundError
      );
    });
  });

  describe('removeMembership', () => {
    it('lets a member leave', async () => {
      const member = await addMember('member', MembershipLevel.MEMBER);
      await manager.removeMembership(member, member.id);
      expect(await store.getMembership(member.id)).toBeNull();
    });

    it('denies a member removing someone else', async () => {
      const member = await addMember('member', MembershipLevel.MEMBER);
      const other = await addMember('other', MembershipLevel.MEMBER);
      await expect(manager.removeMembership(member, other.id)).rejects.toBeInstanceOf(PermissionDeniedError);
      expect(await store.getMembership(other.id)).not.toBeNull();
    });

    it('clears the removed user context', async () => {
      const admin = await addMember('admin', MembershipLevel.ADMIN);
      const member = await addMember('member', MembershipLevel.MEMBER);
      const team = await store.getFirstTeam(org.id);
      await store.updateUserContext('member', { currentOrganizationId: org.id, currentTeamId: team?.id ?? null });

      await manager.removeMembership(admin, member.id);

      expect(await store.getUser('member')).toMatchObject({ currentOrganizationId: null, currentTeamId: null });
    });
  });

  describe('joinOrganization', () => {
    it('creates a member and switches the user into the organization', async () => {
      const user = store.addUser({ id: 'newcomer', email: 'newcomer@example.com' });
      const team = await store.getFirstTeam(org.id);

      const membership = await manager.joinOrganization(user, org.id);

      expect(membership).toMatchObject({ orgId: org.id, userId: 'newcomer', level: MembershipLevel.MEMBER });
      expect(user.currentOrganizationId).toBe(org.id);
      expect(await store.getUser('newcomer')).toMatchObject({
        currentOrganizationId: org.id,
        currentTeamId: team?.id,
      });
    });

    it('keeps the user out of the organization when the join rolls back', async () => {
      const failing = new FailingContextStore(fixedClock(NOW));
      const acme = await failing.insertOrganization({ name: 'Acme' });
      const user = failing.addUser({ id: 'newcomer', email: 'newcomer@example.com' });

      await expect(new MembershipManager(failing).joinOrganization(user, acme.id)).rejects.toThrow('context write failed');

      expect(await failing.findMembership(acme.id, 'newcomer')).toBeNull();
      expect(user.currentOrganizationId).toBeNull();
    });

    it('refuses a second membership in the same organization', async () => {
      const user = store.addUser({ id: 'newcomer', email: 'newcomer@example.com' });
      await manager.joinOrganization(user, org.id);
      await expect(manager.joinOrganization(user, org.id)).rejects.toMatchObject({
        constraint: 'unique_organization_membership',
      });
    });
  });
});
