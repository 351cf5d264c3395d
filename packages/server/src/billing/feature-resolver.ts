import { BillingPlanDetails, BillingProvider, BillingRelation, LicenseProvider } from '@tenantry/core';

interface ResolvedPlan extends BillingPlanDetails {
  billing: BillingRelation;
}

/**
 * Resolves which plan, and therefore which features, an organization has.
 * Billing attached to the organization wins; without any, the first valid
 * instance license applies.
 */
export class FeatureResolver {
  constructor(
    private billing: BillingProvider,
    private licenses: LicenseProvider | null = null
  ) {}

  async getPlanDetails(orgId: string): Promise<BillingPlanDetails> {
    const { plan, realm } = await this.resolve(orgId);
    return { plan, realm };
  }

  async getBillingPlan(orgId: string): Promise<string | null> {
    return (await this.resolve(orgId)).plan;
  }

  async getAvailableFeatures(orgId: string): Promise<string[]> {
    const { plan, realm, billing } = await this.resolve(orgId);
    if (!plan) return [];
    if (realm === 'ee') {
      return this.licenses ? this.licenses.featuresForPlan(plan) : [];
    }
    return billing.status === 'present' ? billing.availableFeatures : [];
  }

  async isFeatureAvailable(orgId: string, feature: string): Promise<boolean> {
    return (await this.getAvailableFeatures(orgId)).includes(feature);
  }

  private async resolve(orgId: string): Promise<ResolvedPlan> {
    const billing = await this.billing.getBilling(orgId);
    switch (billing.status) {
      case 'present':
        return { plan: billing.planKey, realm: 'cloud', billing };
      case 'none':
        return { plan: null, realm: null, billing };
      case 'absent': {
        const license = this.licenses ? await this.licenses.firstValid() : null;
        if (license) return { plan: license.plan, realm: 'ee', billing };
        return { plan: null, realm: null, billing };
      }
    }
  }
}
