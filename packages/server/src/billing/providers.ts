import { Pool } from 'pg';
import {
  BillingProvider,
  BillingRelation,
  Clock,
  License,
  LicenseProvider,
  systemClock,
} from '@tenantry/core';
import { getLicensePlanFeatures } from './plan-definitions';

/**
 * Hosted deployments attach billing to each organization.
 * No row means the organization has no billing record at all; a row without
 * a plan means billing exists but nothing is subscribed.
 */
export class PgBillingProvider implements BillingProvider {
  constructor(private db: Pool) {}

  async getBilling(orgId: string): Promise<BillingRelation> {
    const { rows } = await this.db.query<{
      plan_key: string | null;
      available_features: string[];
    }>(
      'SELECT plan_key, available_features FROM organization_billing WHERE org_id = $1',
      [orgId]
    );
    if (rows.length === 0) return { status: 'absent' };
    const r = rows[0];
    if (r.plan_key === null) return { status: 'none' };
    return { status: 'present', planKey: r.plan_key, availableFeatures: r.available_features };
  }
}

/** Self-managed deployments have no per-organization billing. */
export class SelfHostedBillingProvider implements BillingProvider {
  async getBilling(): Promise<BillingRelation> {
    return { status: 'absent' };
  }
}

export class PgLicenseProvider implements LicenseProvider {
  constructor(
    private db: Pool,
    private clock: Clock = systemClock
  ) {}

  async firstValid(): Promise<License | null> {
    const { rows } = await this.db.query<{
      id: string;
      plan: string;
      valid_until: Date;
      created_at: Date;
    }>(
      `SELECT id, plan, valid_until, created_at FROM licenses
       WHERE valid_until >= $1
       ORDER BY created_at
       LIMIT 1`,
      [this.clock.now()]
    );
    if (rows.length === 0) return null;
    const r = rows[0];
    return { id: r.id, plan: r.plan, validUntil: r.valid_until, createdAt: r.created_at };
  }

  featuresForPlan(plan: string): string[] {
    return getLicensePlanFeatures(plan);
  }
}
