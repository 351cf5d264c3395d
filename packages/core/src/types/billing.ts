export type BillingRealm = 'cloud' | 'ee';

/**
 * Billing attached directly to an organization.
 * `absent` means the deployment has no per-organization billing at all,
 * `none` means it does but this organization has nothing attached.
 */
export type BillingRelation =
  | { status: 'absent' }
  | { status: 'none' }
  | { status: 'present'; planKey: string | null; availableFeatures: string[] };

export interface BillingProvider {
  getBilling(orgId: string): Promise<BillingRelation>;
}

export interface License {
  id: string;
  plan: string;
  validUntil: Date;
  createdAt: Date;
}

/** Instance-wide licensing, used by self-managed deployments. */
export interface LicenseProvider {
  firstValid(): Promise<License | null>;
  featuresForPlan(plan: string): string[];
}

export interface BillingPlanDetails {
  plan: string | null;
  realm: BillingRealm | null;
}
