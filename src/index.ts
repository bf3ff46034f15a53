export { runPipeline } from './pipeline/runPipeline';
export type { DocumentSource, ResumeState, RunPipelineOptions, RunSummary } from './pipeline/runPipeline';
export { processDocument, finalizeDocument } from './pipeline/processDocument';
export * from './pipeline/errors';
export * from './pipeline/types';
export { loadPipelineConfig, parsePipelineConfig, PipelineConfigSchema } from './config/pipelineConfig';
export type { PipelineConfig, PipelineConfigInput } from './config/pipelineConfig';
export { buildExtractors } from './extractors/registry';
export type { Extractor, ExtractorContext } from './extractors/types';
export { reconcile, reconcileOptionsFrom } from './reconcile/reconcile';
export { applyEnrichment } from './reconcile/applyEnrichment';
export { assignStableId } from './identity/stableId';
export { DuplicateIndex } from './identity/duplicateIndex';
export { createEnrichmentClient, EnrichmentClient } from './enrich';
export type { Enricher, EnrichmentOutcome, RegistryClient, RegistryRecord } from './enrich';
export { DiagnosticsAccumulator } from './diagnostics/accumulator';
export type { DiagnosticsTable, DiagnosticsRow } from './diagnostics/accumulator';
export { formatDiagnosticsCsv } from './diagnostics/table';
export { readPdfDocuments } from './ingest/pdfDocumentSource';
export { GrobidClient } from './ingest/grobidClient';
export { JsonlSink, loadProcessedKeys, type JsonlSinkOptions } from './output/jsonlSink';
export { MemorySink } from './output/memorySink';
export type { RecordSink } from './output/types';
