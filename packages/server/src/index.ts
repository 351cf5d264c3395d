import { Pool } from 'pg';
import { systemClock, BillingProvider, Clock } from '@tenantry/core';
import { FeatureResolver } from './billing/feature-resolver';
import { PgBillingProvider, PgLicenseProvider, SelfHostedBillingProvider } from './billing/providers';
import { Config } from './config';
import { PgOrgStore } from './db/pg-store';
import { InviteManager } from './invites/invite-manager';
import { setLogLevel } from './logger';
import { MembershipManager } from './organizations/membership-manager';
import { OrgManager } from './organizations/org-manager';

export * from './errors';
export { logger, setLogLevel } from './logger';
export type { LogLevel } from './logger';
export { loadConfig, parseConfig } from './config';
export type { Config } from './config';
export type { OrgStore, NewInvite, UserContext } from './db/store';
export { PgOrgStore, DEFAULT_TEAM_NAME } from './db/pg-store';
export { FeatureResolver } from './billing/feature-resolver';
export { PgBillingProvider, PgLicenseProvider, SelfHostedBillingProvider } from './billing/providers';
export { LICENSE_PLANS, getLicensePlanFeatures } from './billing/plan-definitions';
export { deleteMembership } from './organizations/consistency';
export { MembershipManager } from './organizations/membership-manager';
export { OrgManager } from './organizations/org-manager';
export type { BootstrapOptions, BootstrapResult, OrgManagerOptions } from './organizations/org-manager';
export { InviteManager } from './invites/invite-manager';
export type {
  CreateInviteInput,
  InviteManagerOptions,
  UseInviteOptions,
  ValidateInviteOptions,
} from './invites/invite-manager';

export interface OrgServices {
  pool: Pool;
  store: PgOrgStore;
  features: FeatureResolver;
  orgs: OrgManager;
  memberships: MembershipManager;
  invites: InviteManager;
  close(): Promise<void>;
}

/**
 * Wires the PostgreSQL pool, billing resolution and managers from config.
 */
export function createOrgServices(
  config: Config,
  clock: Clock = systemClock,
  pool: Pool = new Pool({ connectionString: config.databaseUrl })
): OrgServices {
  setLogLevel(config.logLevel);

  const store = new PgOrgStore(pool);

  const billing: BillingProvider =
    config.billingMode === 'cloud' ? new PgBillingProvider(pool) : new SelfHostedBillingProvider();
  // Organizations without a billing row fall back to the instance license in either mode.
  const features = new FeatureResolver(billing, new PgLicenseProvider(pool, clock));

  const orgs = new OrgManager(store, features, { clock, inviteDaysValidity: config.inviteDaysValidity });
  const memberships = new MembershipManager(store);
  const invites = new InviteManager(store, memberships, {
    siteUrl: config.siteUrl,
    clock,
    inviteDaysValidity: config.inviteDaysValidity,
  });

  return {
    pool,
    store,
    features,
    orgs,
    memberships,
    invites,
    close: () => pool.end(),
  };
}
