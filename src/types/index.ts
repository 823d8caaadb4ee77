export * from './account';
export * from './exchange';
export * from './ftx';
