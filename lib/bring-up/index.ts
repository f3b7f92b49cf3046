export * from './compose';
export * from './proxy';
export * from './steps';
export * from './runner';
