export * from './style';
export * from './render-sink';
export * from './paint';
export * from './transform-shape';
