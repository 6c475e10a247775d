export * from './models';
export * from './score';
export * from './matching-client';
