// Core module exports for wheelhouse

export * from '../types';

// Batch coordinator
export { InstallManager, summarize, failureLines, hasFailures } from './installManager';
export type { InstallManagerEvents, InstallManagerOptions, OutcomeSummary } from './installManager';

// Requirement pipeline
export { RequirementPipeline } from './requirementPipeline';
export type { PipelineDependencies, PipelineState } from './requirementPipeline';

// Collaborators
export { MetadataResolver, buildMetadataUrl, candidatesFor } from './resolver/metadataResolver';
export { Fetcher } from './downloaders/fetcher';
export { PipInstaller, execFileRunner } from './installer/pipInstaller';
export type { CommandRunner, CommandResult } from './installer/pipInstaller';

// Config
export { ConfigManager, getConfigManager, DEFAULT_CONFIG } from './config';
export type { Config, ConfigKey } from './config';

// Errors
export { TransportError, InstallError, RequirementParseError } from './errors';

// Shared utilities
export * from './shared';
