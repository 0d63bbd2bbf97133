// Main entry point
export { TableCheck } from './TableCheck.js';
export type { TableCheckConfig, TableCheckReport, GenerateTemplateOptions } from './TableCheck.js';

// Domain model
export type { Field, FieldType } from './domain/model/Field.js';
export { Table, TableDefinitionError } from './domain/model/Table.js';
export { DataModel } from './domain/model/DataModel.js';
export { ErrorKind, describeError, errorKindFromCode } from './domain/model/ErrorKind.js';
export type { LexicalErrorKind, ErrorDescriptor } from './domain/model/ErrorKind.js';
export type { ValidationError, ErrorContext, ContextValue } from './domain/model/ValidationError.js';
export { formatContext, formatValidationError } from './domain/model/ValidationError.js';
export { ValidationResult } from './domain/model/ValidationResult.js';
export type { ValidationSummary } from './domain/model/ValidationSummary.js';
export { ValidatorStatus, canTransition } from './domain/model/ValidatorStatus.js';
export { NO_PARAMS, bindRule } from './domain/model/Plan.js';
export type {
  Rule,
  BoundRule,
  RuleParams,
  NoParams,
  LengthParams,
  RuleFailure,
  Plan,
  UnsupportedType,
} from './domain/model/Plan.js';

// Domain services
export {
  invalidUtf8Bytes,
  encodingRule,
  requiredRule,
  integerRule,
  bigIntegerRule,
  numberRule,
  dateRule,
  datetimeRule,
  stringLengthRule,
  createRuleRegistry,
  DEFAULT_RULE_REGISTRY,
} from './domain/services/FieldRules.js';
export type { RuleFactory, RuleRegistry } from './domain/services/FieldRules.js';
export { compilePlan, bindFieldRules } from './domain/services/PlanCompiler.js';
export {
  compressLineRanges,
  sampleErrors,
  summarizeResult,
  DEFAULT_SAMPLE_SIZE,
} from './domain/services/ErrorSummary.js';
export type { SampleOptions, SummaryOptions, ErrorGroupSummary, ResultSummary } from './domain/services/ErrorSummary.js';

// Events
export type {
  DomainEvent,
  EventType,
  EventPayload,
  ValidationStartedEvent,
  HeaderCheckedEvent,
  UnsupportedTypeEvent,
  ErrorLoggedEvent,
  ValidationProgressEvent,
  ValidationCompletedEvent,
  ValidationFailedEvent,
} from './domain/events/DomainEvents.js';

// Application internals (for custom drivers)
export { EventBus } from './application/EventBus.js';
export type { HandlerErrorFn } from './application/EventBus.js';
export { TableValidator, HeaderError } from './application/TableValidator.js';
export type { TableValidatorOptions } from './application/TableValidator.js';

// Ports (for custom implementations)
export type { DataSource, SourceMetadata } from './domain/ports/DataSource.js';

// Infrastructure
export { QuotedCsvScanner } from './infrastructure/parsers/QuotedCsvScanner.js';
export type { ScannerOptions, ScanStep, ScannedField, ScannedComment, ScanFailure } from './infrastructure/parsers/QuotedCsvScanner.js';
export { RowReader } from './infrastructure/parsers/RowReader.js';
export type { RowReadResult, ScannedRow, MalformedRow } from './infrastructure/parsers/RowReader.js';
export { CsvFormatter } from './infrastructure/parsers/CsvFormatter.js';
export type { CsvFormatterOptions } from './infrastructure/parsers/CsvFormatter.js';
export { BufferSource } from './infrastructure/sources/BufferSource.js';
export type { BufferSourceOptions } from './infrastructure/sources/BufferSource.js';
export { StreamSource } from './infrastructure/sources/StreamSource.js';
export type { StreamSourceOptions } from './infrastructure/sources/StreamSource.js';
export { FilePathSource } from './infrastructure/sources/FilePathSource.js';
export type { FilePathSourceOptions } from './infrastructure/sources/FilePathSource.js';
export { detectCompression, resolveCompression } from './infrastructure/detectCompression.js';
export type { Compression } from './infrastructure/detectCompression.js';
export {
  parseTableDefinition,
  parseModelDefinition,
  loadModelDefinition,
  loadTableDefinition,
  readModelDefinitionFile,
  readTableDefinitionFile,
} from './infrastructure/schema/JsonTableLoader.js';
