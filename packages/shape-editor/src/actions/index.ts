export * from './types';
export * from './apply';
export * from './move-shape-points';
export * from './insert-shape';
export * from './replace-shapes';
export * from './remove-shape-points';
export * from './add-shape-points';
export * from './apply-shape-params';
