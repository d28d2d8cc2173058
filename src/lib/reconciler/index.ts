export { AUTHENTICATED_OWNER, Reconciler, type ReconcilerDependencies, type RunOptions } from './reconciler.js';
