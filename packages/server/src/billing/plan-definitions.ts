/** Feature identifiers unlocked by each instance-license plan. */
export const LICENSE_PLANS: Record<string, string[]> = {
  starter: ['organizations_projects'],
  growth: ['organizations_projects', 'zapier', 'google_login', 'dashboard_collaboration'],
  enterprise: [
    'organizations_projects',
    'zapier',
    'google_login',
    'dashboard_collaboration',
    'saml',
    'audit_log',
    'project_based_permissioning',
  ],
};

export function getLicensePlanFeatures(plan: string): string[] {
  return Object.hasOwn(LICENSE_PLANS, plan) ? LICENSE_PLANS[plan] : [];
}
