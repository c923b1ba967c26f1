export * from './shape-point-index';
export * from './visitor';
export * from './queries';
export * from './clone';
export * from './builders';
export * from './params';
