export * from './candidates';
export * from './dates';
export * from './guard';
export * from './html';
export * from './ratings';
export * from './research';
