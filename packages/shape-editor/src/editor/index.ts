export * from './options';
export * from './events';
export * from './shape-editor';
