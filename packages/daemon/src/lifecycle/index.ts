/**
 * Lifecycle module barrel export.
 *
 * Re-exports IssuerLifecycle, signal handler, and BackgroundWorkers.
 */

export { IssuerLifecycle } from './issuer-lifecycle.js';
export type { IssuerCollaborators, IssuerLifecycleOptions } from './issuer-lifecycle.js';
export { registerSignalHandlers } from './signal-handler.js';
export { BackgroundWorkers } from './workers.js';
export type { BackgroundWorkersOptions } from './workers.js';
