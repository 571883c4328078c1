export type { PipelineConfig, ProcessResult } from './pipeline.js';
export { DecodePipeline } from './pipeline.js';
