export * from './types';
export * from './errors';
export * from './utils';
export * from './result';
export * from './transaction';
export * from './connection';
