import { randomUUID } from 'crypto';
import { Pool, PoolClient, QueryResultRow } from 'pg';
import { nanoid } from 'nanoid';
import {
  MembershipLevel,
  Organization,
  OrganizationFields,
  OrganizationInvite,
  OrganizationMembership,
  OrgTeam,
  OrgUser,
  TeamFields,
  toMembershipLevel,
} from '@tenantry/core';
import { ConflictError } from '../errors';
import { logger } from '../logger';
import { NewInvite, OrgStore, UserContext } from './store';

type OrganizationRow = {
  id: string;
  name: string;
  onboarding_completed: boolean;
  personalization: Record<string, unknown>;
  created_at: Date;
  updated_at: Date;
};

type TeamRow = { id: string; org_id: string; name: string; created_at: Date };

type UserRow = {
  id: string;
  email: string;
  first_name: string;
  current_organization_id: string | null;
  current_team_id: string | null;
};

type MembershipRow = {
  id: string;
  org_id: string;
  user_id: string;
  level: number;
  joined_at: Date;
  updated_at: Date;
};

type InviteRow = {
  id: string;
  org_id: string;
  target_email: string | null;
  first_name: string;
  created_by_id: string | null;
  emailing_attempt_made: boolean;
  created_at: Date;
  updated_at: Date;
};

export const DEFAULT_TEAM_NAME = 'Default Project';

const UNIQUE_VIOLATION = '23505';

function toConflict(err: unknown): ConflictError | null {
  if (typeof err !== 'object' || err === null) return null;
  if (!('code' in err) || err.code !== UNIQUE_VIOLATION) return null;
  const constraint = 'constraint' in err && typeof err.constraint === 'string' ? err.constraint : 'unique constraint';
  return new ConflictError(constraint);
}

/**
 * PostgreSQL-backed store. Tables and constraints are defined in schema.sql.
 */
export class PgOrgStore implements OrgStore {
  constructor(
    private db: Pool,
    private client: PoolClient | null = null
  ) {}

  async transaction<T>(fn: (tx: OrgStore) => Promise<T>): Promise<T> {
    if (this.client) return fn(this);

    const client = await this.db.connect();
    // Set when ROLLBACK fails; the connection is then discarded rather than reused.
    let broken: Error | undefined;
    try {
      await client.query('BEGIN');
      const result = await fn(new PgOrgStore(this.db, client));
      await client.query('COMMIT');
      return result;
    } catch (error) {
      try {
        await client.query('ROLLBACK');
      } catch (rollbackError) {
        broken = rollbackError instanceof Error ? rollbackError : new Error(String(rollbackError));
        logger.error('db.rollback_failed', broken);
      }
      throw error;
    } finally {
      client.release(broken);
    }
  }

  private async query<R extends QueryResultRow>(text: string, params: unknown[] = []): Promise<R[]> {
    try {
      const result = this.client
        ? await this.client.query<R>(text, params)
        : await this.db.query<R>(text, params);
      return result.rows;
    } catch (error) {
      throw toConflict(error) ?? error;
    }
  }

  // ---- Organizations ----

  async insertOrganization(fields: OrganizationFields): Promise<Organization> {
    const rows = await this.query<OrganizationRow>(
      `INSERT INTO organizations (id, name, onboarding_completed, personalization)
       VALUES ($1, $2, $3, $4)
       RETURNING *`,
      [randomUUID(), fields.name, fields.onboardingCompleted ?? true, JSON.stringify(fields.personalization ?? {})]
    );
    return this.mapOrg(rows[0]);
  }

  async getOrganization(orgId: string): Promise<Organization | null> {
    const rows = await this.query<OrganizationRow>('SELECT * FROM organizations WHERE id = $1', [orgId]);
    return rows[0] ? this.mapOrg(rows[0]) : null;
  }

  async setOnboardingCompleted(orgId: string, completed: boolean): Promise<Organization | null> {
    const rows = await this.query<OrganizationRow>(
      `UPDATE organizations SET onboarding_completed = $2, updated_at = NOW()
       WHERE id = $1
       RETURNING *`,
      [orgId, completed]
    );
    return rows[0] ? this.mapOrg(rows[0]) : null;
  }

  async deleteOrganization(orgId: string): Promise<void> {
    await this.query('DELETE FROM organizations WHERE id = $1', [orgId]);
  }

  // ---- Teams ----

  async insertTeam(orgId: string, fields: TeamFields): Promise<OrgTeam> {
    const rows = await this.query<TeamRow>(
      'INSERT INTO org_teams (id, org_id, name) VALUES ($1, $2, $3) RETURNING *',
      [nanoid(), orgId, fields.name ?? DEFAULT_TEAM_NAME]
    );
    return this.mapTeam(rows[0]);
  }

  async getTeam(teamId: string): Promise<OrgTeam | null> {
    const rows = await this.query<TeamRow>('SELECT * FROM org_teams WHERE id = $1', [teamId]);
    return rows[0] ? this.mapTeam(rows[0]) : null;
  }

  async getFirstTeam(orgId: string): Promise<OrgTeam | null> {
    const rows = await this.query<TeamRow>(
      'SELECT * FROM org_teams WHERE org_id = $1 ORDER BY created_at, id LIMIT 1',
      [orgId]
    );
    return rows[0] ? this.mapTeam(rows[0]) : null;
  }

  // ---- Users ----

  async getUser(userId: string): Promise<OrgUser | null> {
    const rows = await this.query<UserRow>(
      `SELECT id, email, first_name, current_organization_id, current_team_id
       FROM users WHERE id = $1`,
      [userId]
    );
    const r = rows[0];
    if (!r) return null;
    return {
      id: r.id,
      email: r.email,
      firstName: r.first_name,
      currentOrganizationId: r.current_organization_id,
      currentTeamId: r.current_team_id,
    };
  }

  async updateUserContext(userId: string, context: UserContext): Promise<void> {
    await this.query(
      'UPDATE users SET current_organization_id = $2, current_team_id = $3 WHERE id = $1',
      [userId, context.currentOrganizationId, context.currentTeamId]
    );
  }

  // ---- Memberships ----

  async insertMembership(orgId: string, userId: string, level: MembershipLevel): Promise<OrganizationMembership> {
    const rows = await this.query<MembershipRow>(
      `INSERT INTO org_memberships (id, org_id, user_id, level)
       VALUES ($1, $2, $3, $4)
       RETURNING *`,
      [randomUUID(), orgId, userId, level]
    );
    return this.mapMembership(rows[0]);
  }

  async getMembership(membershipId: string): Promise<OrganizationMembership | null> {
    const rows = await this.query<MembershipRow>('SELECT * FROM org_memberships WHERE id = $1', [membershipId]);
    return rows[0] ? this.mapMembership(rows[0]) : null;
  }

  async findMembership(orgId: string, userId: string): Promise<OrganizationMembership | null> {
    const rows = await this.query<MembershipRow>(
      'SELECT * FROM org_memberships WHERE org_id = $1 AND user_id = $2',
      [orgId, userId]
    );
    return rows[0] ? this.mapMembership(rows[0]) : null;
  }

  async listMemberships(orgId: string): Promise<OrganizationMembership[]> {
    const rows = await this.query<MembershipRow>(
      'SELECT * FROM org_memberships WHERE org_id = $1 ORDER BY joined_at',
      [orgId]
    );
    return rows.map(r => this.mapMembership(r));
  }

  async hasMemberWithEmail(orgId: string, email: string): Promise<boolean> {
    const rows = await this.query(
      `SELECT 1
       FROM org_memberships m
       JOIN users u ON u.id = m.user_id
       WHERE m.org_id = $1 AND u.email = $2
       LIMIT 1`,
      [orgId, email]
    );
    return rows.length > 0;
  }

  async updateMembershipLevel(membershipId: string, level: MembershipLevel): Promise<OrganizationMembership | null> {
    const rows = await this.query<MembershipRow>(
      `UPDATE org_memberships SET level = $2, updated_at = NOW()
       WHERE id = $1
       RETURNING *`,
      [membershipId, level]
    );
    return rows[0] ? this.mapMembership(rows[0]) : null;
  }

  async deleteMembershipRow(membershipId: string): Promise<void> {
    await this.query('DELETE FROM org_memberships WHERE id = $1', [membershipId]);
  }

  // ---- Invites ----

  async insertInvite(invite: NewInvite): Promise<OrganizationInvite> {
    const rows = await this.query<InviteRow>(
      `INSERT INTO org_invites (id, org_id, target_email, first_name, created_by_id)
       VALUES ($1, $2, $3, $4, $5)
       RETURNING *`,
      [randomUUID(), invite.orgId, invite.targetEmail, invite.firstName, invite.createdById]
    );
    return this.mapInvite(rows[0]);
  }

  async getInvite(inviteId: string): Promise<OrganizationInvite | null> {
    const rows = await this.query<InviteRow>('SELECT * FROM org_invites WHERE id = $1', [inviteId]);
    return rows[0] ? this.mapInvite(rows[0]) : null;
  }

  async listInvitesCreatedAfter(orgId: string, since: Date): Promise<OrganizationInvite[]> {
    const rows = await this.query<InviteRow>(
      `SELECT * FROM org_invites
       WHERE org_id = $1 AND created_at > $2
       ORDER BY created_at DESC`,
      [orgId, since]
    );
    return rows.map(r => this.mapInvite(r));
  }

  async markEmailingAttempt(inviteId: string): Promise<OrganizationInvite | null> {
    const rows = await this.query<InviteRow>(
      `UPDATE org_invites SET emailing_attempt_made = TRUE, updated_at = NOW()
       WHERE id = $1
       RETURNING *`,
      [inviteId]
    );
    return rows[0] ? this.mapInvite(rows[0]) : null;
  }

  async deleteInvite(inviteId: string): Promise<void> {
    await this.query('DELETE FROM org_invites WHERE id = $1', [inviteId]);
  }

  async deleteInvitesByEmail(email: string): Promise<number> {
    const rows = await this.query(
      'DELETE FROM org_invites WHERE LOWER(target_email) = LOWER($1) RETURNING id',
      [email]
    );
    return rows.length;
  }

  // ---- Mappers ----

  private mapOrg(row: OrganizationRow): Organization {
    return {
      id: row.id,
      name: row.name,
      onboardingCompleted: row.onboarding_completed,
      personalization: row.personalization,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    };
  }

  private mapTeam(row: TeamRow): OrgTeam {
    return {
      id: row.id,
      orgId: row.org_id,
      name: row.name,
      createdAt: row.created_at,
    };
  }

  private mapMembership(row: MembershipRow): OrganizationMembership {
    return {
      id: row.id,
      orgId: row.org_id,
      userId: row.user_id,
      level: toMembershipLevel(row.level),
      joinedAt: row.joined_at,
      updatedAt: row.updated_at,
    };
  }

  private mapInvite(row: InviteRow): OrganizationInvite {
    return {
      id: row.id,
      orgId: row.org_id,
      targetEmail: row.target_email,
      firstName: row.first_name,
      createdById: row.created_by_id,
      emailingAttemptMade: row.emailing_attempt_made,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    };
  }
}
