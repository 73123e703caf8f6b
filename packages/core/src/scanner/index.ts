export { discoverFiles } from './FileDiscovery.js';
export { createPathFilter, isWithin } from './PathFilter.js';
export type { PathFilter, PathFilterOptions } from './PathFilter.js';
export { ScannableFile } from './ScannableFile.js';
export type { SnapshotOptions } from './ScannableFile.js';
export { ScanOrchestrator } from './ScanOrchestrator.js';
export type { ScanRequest, ScanOrchestratorOptions } from './ScanOrchestrator.js';
