export const name = '@copyhead/core';

export * from './caches';
export * from './config/loader';
export * from './detect';
export * from './header';
export * from './orchestrator';
export * from './processor';
export * from './run';
export * from './styles';
export * from './template';
