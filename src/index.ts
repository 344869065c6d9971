// Main entry point
export { ResourceValidation } from './ResourceValidation.js';
export type { ResourceValidationConfig, DescriptorValidationOptions } from './ResourceValidation.js';

// Domain model
export type { FieldSchema, FieldType } from './domain/model/FieldSchema.js';
export { FIELD_TYPES, isFieldType } from './domain/model/FieldSchema.js';
export type { ResourceSchema, ForeignKeyDecl } from './domain/model/ResourceSchema.js';
export { findField } from './domain/model/ResourceSchema.js';
export type { Row } from './domain/model/Row.js';
export { readCell } from './domain/model/Row.js';
export type { TypedValue, CalendarDate } from './domain/model/TypedValue.js';
export { canonicalForm } from './domain/model/TypedValue.js';
export type { ValidationError, ValidationErrorReason, CoercionResult } from './domain/model/ValidationResult.js';
export type { ValidationReport, ReportRecord } from './domain/model/ValidationReport.js';
export { createReport, toReportRecords, serializeReport } from './domain/model/ValidationReport.js';
export { ValidationStatus, canTransition, isTerminal } from './domain/model/ValidationStatus.js';

// Errors
export { SchemaConfigurationError } from './domain/errors/SchemaConfigurationError.js';
export { ValidationAbortedError } from './domain/errors/ValidationAbortedError.js';
export { SourceParseError } from './domain/errors/SourceParseError.js';

// Use case result types
export type { ValidationStatusResult } from './application/usecases/GetValidationStatus.js';

// Domain services
export { coerce } from './domain/services/TypeCoercer.js';
export { DateFormat, compileDateFormat } from './domain/services/DateFormat.js';
export { validateRow, coerceRow } from './domain/services/RowValidator.js';
export type { CoercedRow } from './domain/services/RowValidator.js';
export { checkForeignKey, snapshotKeys } from './domain/services/ForeignKeyChecker.js';
export type { ReferenceKeySet } from './domain/services/ForeignKeyChecker.js';
export { assertValidSchema, schemaProblems } from './domain/services/SchemaRules.js';
export { PrimaryKeyTracker } from './domain/services/PrimaryKeyTracker.js';
export { validate, validateAsync, ReportAccumulator } from './domain/services/ResourceValidator.js';
export type { ValidateOptions, RowObserver } from './domain/services/ResourceValidator.js';

// Domain events
export type {
  DomainEvent,
  EventType,
  EventPayload,
  ValidationSummary,
  ValidationStartedEvent,
  RowInvalidEvent,
  ValidationProgressEvent,
  ValidationCompletedEvent,
  ValidationAbortedEvent,
  ValidationFailedEvent,
} from './domain/events/DomainEvents.js';

// Ports (for custom adapters)
export type { DataSource, SourceEncoding } from './domain/ports/DataSource.js';
export type { SourceParser, ParserOptions } from './domain/ports/SourceParser.js';

// Built-in adapters
export { CsvParser } from './infrastructure/parsers/CsvParser.js';
export { BufferSource } from './infrastructure/sources/BufferSource.js';
export { FilePathSource } from './infrastructure/sources/FilePathSource.js';
export type { FilePathSourceOptions } from './infrastructure/sources/FilePathSource.js';
export { StreamSource } from './infrastructure/sources/StreamSource.js';
export type { StreamSourceOptions } from './infrastructure/sources/StreamSource.js';

// Descriptors and reference data
export type { ResourceDescriptor, SourceInfo, LicenseInfo } from './infrastructure/descriptor/ResourceDescriptor.js';
export { parseResourceDescriptor, loadResourceDescriptor } from './infrastructure/descriptor/parseResourceDescriptor.js';
export { loadReferenceKeys, loadReferenceKeysFrom } from './infrastructure/reference/loadReferenceKeys.js';
export type { ReferenceKeys } from './infrastructure/reference/loadReferenceKeys.js';
