export {
  PlaylistPruner,
  createCredentialStore,
  type PrunerCallbacks,
  type PrunerDependencies,
} from './pruner.js';
export * from './errors.js';
export * from './auth/index.js';
export * from './youtube/index.js';
export * from './audit/index.js';
export * from './removal/index.js';
export * from './config/index.js';
