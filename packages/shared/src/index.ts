export const name = '@testbuilder/shared';

export * from './types/events';
export * from './logger';
export * from './errors';
export * from './fs';
export * from './config/schema';
