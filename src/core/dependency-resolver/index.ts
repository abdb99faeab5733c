/**
 * Dependency resolver
 *
 * - load-order.ts: dependencies-first load order with cycle detection
 * - removal-safety.ts: unload/uninstall blocking checks
 * - install-order.ts: ordering of multi-package install requests
 */

export type { SafetyVerdict, LoadOrderOptions } from './types.js';
export { resolveLoadOrder } from './load-order.js';
export { resolveUnloadSafety, resolveUninstallSafety } from './removal-safety.js';
export { resolveInstallOrder, findUnsatisfiedDependencies, type InstallCandidate } from './install-order.js';
