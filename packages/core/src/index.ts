export * from './types/organization';
export * from './types/billing';
export * from './utils/email';
