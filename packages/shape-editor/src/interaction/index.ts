export * from './canvas-transform';
export * from './input';
export * from './keyboard';
export * from './interactions';
export * from './shape-constructors';
