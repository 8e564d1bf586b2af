export * from './config';
export * from './messages';
