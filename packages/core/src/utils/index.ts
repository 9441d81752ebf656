export * from './session';
export * from './to-error';
export * from './uuid';
export * from './validation';
