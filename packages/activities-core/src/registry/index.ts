export * from './activity-registry';
export * from './seed';
