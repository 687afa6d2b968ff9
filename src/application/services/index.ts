export { DownloadRegistry } from './DownloadRegistry';
export type { RegistryAddResult, DownloadRegistryOptions } from './DownloadRegistry';
export { MetadataAcquirer } from './MetadataAcquirer';
export { PrioritizationPolicy } from './PrioritizationPolicy';
export { StreamingReadinessEvaluator } from './StreamingReadinessEvaluator';
export { StatusReporter } from './StatusReporter';
export { LifecycleManager } from './LifecycleManager';
export type { SweepResult } from './LifecycleManager';
