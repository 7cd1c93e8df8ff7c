export * from './user';
export * from './company';
export * from './object';
export * from './offer';
