export * from './models';
export * from './settings';
export * from './recommendation-api';
export * from './feedback-dispatcher';
export * from './session-manager';
