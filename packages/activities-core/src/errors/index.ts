export * from './registry-error';
