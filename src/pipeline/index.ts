export * from './types.js';
export { PipelineOrchestrator, type OrchestratorOptions, type StageSet } from './orchestrator.js';
export { RunRegistry, type RunEvent, type RunPoll } from './run-registry.js';
export { createPipeline, type PipelineCollaborators } from './factory.js';
