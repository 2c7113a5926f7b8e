export * from './schema';
export * from './expressions';
export * from './matrix';
export * from './validator';
export * from './parser';
export * from './compiler';
export * from './trigger';
