export const name = '@testbuilder/exec';

export * from './runner/types';
export * from './runner/runner';
