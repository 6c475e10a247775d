export * from './models';
export * from './interest-api';
export * from './fallback-taxonomy';
export * from './taxonomy-store';
export * from './profile-repository';
export * from './selection-machine';
