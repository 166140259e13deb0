export * from './path';
export * from './io';
