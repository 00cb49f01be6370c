export * from './bootstrap';
export * from './resources';
export * from './secrets';
