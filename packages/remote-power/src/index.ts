export * from './hardware';
export * from './validation';
export * from './credentials';
export * from './status';
export * from './repository';
export * from './service';
