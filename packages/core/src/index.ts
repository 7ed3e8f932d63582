/** @field-audit/core - Field-level change auditing engine */

// Constants
export type { InstanceState, SortOrder } from './constants.js';
export { DEFAULTS, INSTANCE_STATE } from './constants.js';
// Context
export type { AuditContextStack } from './context/context-stack.js';
export { createContextStack } from './context/context-stack.js';
export { createAsyncLocalStorageProvider } from './context/context-provider.js';
export { assertValidFrame, createAuditFrame, FRAME_LIMITS, resolveEffectiveContext } from './context/frame.js';
export type { AuditContextProvider, AuditFrame, EffectiveAuditContext, UserIdResolver } from './context/types.js';
// Diff
export { collectDirtyEntries, createDiffEngine } from './diff/diff-engine.js';
export type { RecordSnapshot } from './diff/snapshot-source.js';
export { createSnapshotSource } from './diff/snapshot-source.js';
export type { DiffEngine, DirtyEntry, DirtyStateSource } from './diff/types.js';
// Domain - Branded Types
export type { CommitId, RawId, ResourceId } from './domain/branded-types.js';
export {
  createCommitId,
  createResourceId,
  IdValidationError,
  normalizeId,
  tryNormalizeId,
} from './domain/branded-types.js';
// Domain - Change Log Types
export type { ChangeLogEntry, ChangeLogInput, PendingChange } from './domain/change-log-types.js';
// Domain - Smart Constructors
export type { Result, ValidationError } from './domain/smart-constructors.js';
export { createChangeLogEntry, failure, success } from './domain/smart-constructors.js';
// Engine
export { createAuditEngine } from './engine/audit-engine.js';
export type { AuditEngineOptions } from './engine/config.js';
export { validateEngineOptions } from './engine/config.js';
export type { AuditedWork, AuditEngine, RunAuditedOptions } from './engine/types.js';
// Errors
export {
  AuditError,
  ConfigurationError,
  ContextStackError,
  DeserializationError,
  MissingResourceIdError,
  QueryValidationError,
  TableNotTrackedError,
  UnsupportedTypeError,
} from './errors.js';
// Interfaces
export type * from './interfaces/index.js';
// Retrieval
export type { ChangeRetrieverOptions } from './retrieval/change-retriever.js';
export { createChangeRetriever } from './retrieval/change-retriever.js';
export type {
  ChangeQueryFilters,
  ChangeRecord,
  ChangeRetriever,
  DateRange,
  ResolvedChangeRecord,
  UnreadableChangeRecord,
} from './retrieval/types.js';
// Schema
export type { TrackRecordTypeBuilder } from './schema/builder.js';
export { trackRecordType } from './schema/builder.js';
export { inferValueType } from './schema/field-types.js';
export type { FieldDefinition } from './schema/static-metadata.js';
export { createStaticSchemaMetadata } from './schema/static-metadata.js';
export type { TrackedSchemaRegistryOptions } from './schema/tracked-schema-registry.js';
export { createTrackedSchemaRegistry } from './schema/tracked-schema-registry.js';
export type { DeclareOptions, TrackedField, TrackedSchema, TrackedSchemaRegistry } from './schema/types.js';
// Serialization
export { BUILT_IN_HANDLERS, isBuiltInValueType, toCanonicalJson } from './serialization/built-in-handlers.js';
export { createTypeRegistry } from './serialization/type-registry.js';
export type {
  BuiltInValueType,
  Constructor,
  StoredValue,
  TypeHandler,
  TypeRegistry,
  ValueType,
} from './serialization/types.js';
// Error Handler
export type { AuditErrorContext, AuditErrorHandler, AuditErrorPhase } from './utils/error-handler.js';
export { defaultAuditErrorHandler, normalizeError } from './utils/error-handler.js';
// Writer
export type { AuditWriterOptions } from './writer/audit-writer.js';
export { createAuditWriter } from './writer/audit-writer.js';
export type { IdentityCache, IdentityUnit } from './writer/identity-cache.js';
export { createIdentityCache } from './writer/identity-cache.js';
export type { AuditWriter, SkippedReceipt, WriteReceipt, WrittenReceipt } from './writer/types.js';
