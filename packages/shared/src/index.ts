export const name = '@copyhead/shared';

export * from './types/events';
export * from './types/outcome';
export * from './logger';
export * from './errors';
export * from './config/schema';
export * from './fs/io';
export * from './fs/path';
