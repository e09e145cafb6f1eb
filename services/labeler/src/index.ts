export * from './aggregate';
export * from './cards';
export * from './constants';
export * from './document';
export * from './errors';
export * from './layout';
export * from './pdf-surface';
export * from './schema';
export * from './summary';
export * from './surface';
