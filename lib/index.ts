export * from './commands/command';
export * from './commands/plugin-command';
export * from './commands/registry';
export * from './commands/dispatcher';
export * from './config/config';
export * from './config/loader';
export * from './engine/engine';
export * from './engine/task';
export * from './errors';
export * from './main';
export * from './orchestrator';
export * from './site';
export * from './task-loader';
export * from './util/clock';
export * from './version';
export * from './util/streams';
