export const name = '@testbuilder/core';

export * from './naming/scheme';
export * from './artifacts/files';
export * from './readiness/validator';
export * from './generate/engine';
export * from './manifest/source-set';
export * from './manifest/store';
export * from './sync/synchronizer';
export * from './cleanup/cleaner';
export * from './build/service';
export * from './tools/run-tool';
export * from './config/loader';
export * from './testbuilder';
