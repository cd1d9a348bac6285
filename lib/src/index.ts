/**
 * Legal Case Ingestion - Shared Library
 *
 * Script detection, Bijoy conversion, text normalization, metadata
 * extraction and batch ingestion of legal case PDFs.
 */

// Bengali script detection and Bijoy conversion
export * from './bengali/index.js';

// Text normalization
export * from './text/index.js';

// Case metadata
export * from './metadata/index.js';

// Per-document pipeline
export * from './pipeline/index.js';

// PDF Processing
export * from './pdf/index.js';

// Batch ingestion
export * from './ingest/index.js';

// Logging
export * from './logging/index.js';

// Progress Reporting
export * from './progress/index.js';
