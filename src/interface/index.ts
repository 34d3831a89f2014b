export * from './point';
export * from './mesh';
export * from './options';
