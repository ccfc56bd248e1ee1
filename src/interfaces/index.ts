export * from './server';
export * from './remote-ssh';
export * from './remote-file';
