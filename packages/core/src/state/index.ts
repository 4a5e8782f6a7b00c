export * from './expand-machine';
