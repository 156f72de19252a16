export { InstallPipeline, APP_DISPLAY_NAME } from './pipeline';
export type { InstallPipelineDeps, PipelineCallbacks } from './pipeline';
export { extractTargetMetadata, serviceUnitsIn, pickServiceUnit } from './metadata-extractor';
export type { MetadataOptions, TargetMetadata } from './metadata-extractor';
export { installPackage } from './installer';
export type { InstallOutcome, InstallHooks } from './installer';
export { ServiceActivator } from './service-activator';
export type { ActivateOptions } from './service-activator';
