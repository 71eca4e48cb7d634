export * from './workspace';
export * from './git';
export * from './ignore';
export * from './filters';
export * from './scanner';
