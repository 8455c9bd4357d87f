/**
 * Refinement loop and the file/batch driver built on it.
 */

export { RefinementOrchestrator, RefinementConfig } from './RefinementOrchestrator';
export { DocPipeline, ProcessFilesOptions, configSignature, summarize } from './DocPipeline';
