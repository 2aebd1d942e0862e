// Table configuration
export {
  TableConfigSchema,
  TableConfigBuilder,
  parseTableConfig,
  composeTableConfigs,
  createStandardCustomerConfig,
} from './config/TableConfig';
export type { TableConfig, TableConfigInput, FieldRule, DerivedField } from './config/TableConfig';

export {
  ScdConfigSchema,
  DeleteMarkerSchema,
  CUSTOMER_METADATA_COLUMNS,
  parseScdConfig,
  createCustomerScdConfig,
  createTransactionScdConfig,
  createProductScdConfig,
  createGenericScdConfig,
} from './config/ScdConfig';
export type { ScdConfig, ScdConfigInput, DeleteMarker, DeletePredicate } from './config/ScdConfig';

export {
  MaskingPolicySchema,
  TableDefinitionsFileSchema,
  parseTableDefinitions,
  loadTableDefinitions,
} from './config/tableDefinitions';

// Cleansing
export { CleansingBuilder } from './validation/CleansingBuilder';
export type { CleansingBuilderOptions } from './validation/CleansingBuilder';

// SCD Type 2
export { ScdMergeEngine, mergeBatch } from './scd/ScdMergeEngine';
export { verifyVersionChain, compareVersions } from './scd/integrity';
export { currentRecords, recordsAsOf, historyForKey } from './scd/queries';
export { businessKeyOf, sequenceOrdinal, readSequence, valuesEqual } from './scd/sequence';

// Storage and orchestration
export { InMemoryHistoricalStore } from './storage/InMemoryHistoricalStore';
export { KeyedLock } from './workers/KeyedLock';
export { PipelineOrchestrator, PipelineOptionsSchema } from './workers/PipelineOrchestrator';
export type { PipelineOptions, PipelineDependencies } from './workers/PipelineOrchestrator';

export * from './types';
