export * from './shapes';
export * from './editing';
