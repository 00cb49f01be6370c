export * from './api/auth';
export * from './api/client';
export * from './api/control-plane';
export * from './api/endpoints';
export * from './components';
export * from './core/cloud';
export * from './core/config';
export * from './core/errors';
export * from './core/logger';
export * from './providers';
export * from './uninstaller';
export * from './utils/clock';
export * from './utils/naming';
