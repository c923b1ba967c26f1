export * from './constraints';
export * from './constraint-list';
