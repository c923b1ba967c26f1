export * from './float-index';
export * from './control-points';
export * from './grid';
