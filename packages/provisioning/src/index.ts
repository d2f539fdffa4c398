export * from './commands';
export * from './config';
export * from './domain-sync';
export * from './factory';
export * from './orchestrator';
export * from './power-switch';
export * from './profile';
export * from './resolver';
export * from './shell';
export * from './ssh-session';
export * from './template';
