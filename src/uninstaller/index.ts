export * from './credentials';
export * from './job';
export * from './job-client';
export * from './kubeconfig';
export * from './provider';
export * from './state-machine';
export * from './uninstall';
