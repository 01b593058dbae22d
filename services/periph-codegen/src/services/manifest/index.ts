/**
 * Manifest Services Index
 */

export { ManifestTracker, MANIFEST_VERSION } from './manifest-tracker';
export type { ManifestTrackerConfig, ManifestStatistics, CleanOptions, VerifyStatus } from './manifest-tracker';
export { DependencyGraph } from './dependency-graph';
