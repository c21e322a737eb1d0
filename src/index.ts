export * from './errors.js';
export { config } from './config/index.js';
export * from './variant/types.js';
export { toVcfForm, normalizeRows, parseVcfForm, validateVcfForm, isValidVcfForm } from './variant/normalizer.js';
export { readVariantFile, parseCsvContent, parseVcfContent, VariantFileBatch } from './parser/variant-file-reader.js';
export { HgvsResolver, HgvsResolution } from './annotation/hgvs-resolver.js';
export { ClinVarClient, ClinVarAnnotation, clinVarRecordUrl } from './clinvar/clinvar-client.js';
export { EnrichmentOrchestrator, EnrichmentSummary, EnrichmentState } from './annotation/enrichment-orchestrator.js';
export { openSession, closeSession, withSession, Session } from './db/client.js';
export { findVariant, compareWithStored } from './db/variant-store.js';
export { writePatientBatch, WriteSummary } from './db/batch-writer.js';
export * from './db/variant-search.js';
export { IngestionDriver, IngestionReport } from './ingest/ingestion-driver.js';
export { RequestThrottle } from './utils/throttle.js';
export { Logger, createLogger } from './utils/logger.js';
export { IngestionProgress, ProgressBar, ProgressBarSet } from './utils/progress.js';
