// Schema factory
export { createType } from "./type/create_type.ts";
export type {
  CreateTypeOptions,
  SchemaLike,
  SchemaObject,
} from "./type/create_type.ts";

// Schema types
export { Type } from "./schemas/type.ts";
export type {
  FieldKind,
  IsValidOptions,
  JSONType,
  ValueOf,
} from "./schemas/type.ts";
export { PrimitiveType } from "./schemas/primitive/primitive_type.ts";
export type { PrimitiveTypeOptions } from "./schemas/primitive/primitive_type.ts";

// Primitive types
export { BooleanType } from "./schemas/primitive/boolean_type.ts";
export { IntType } from "./schemas/primitive/int_type.ts";
export type { IntTypeOptions } from "./schemas/primitive/int_type.ts";
export { LongType } from "./schemas/primitive/long_type.ts";
export type { LongTypeOptions } from "./schemas/primitive/long_type.ts";
export { DoubleType } from "./schemas/primitive/double_type.ts";
export type { DoubleTypeOptions } from "./schemas/primitive/double_type.ts";
export { escapeText, StringType } from "./schemas/primitive/string_type.ts";
export type { StringTypeOptions } from "./schemas/primitive/string_type.ts";
export { NullableType } from "./schemas/primitive/nullable_type.ts";
export type { NullableTypeOptions } from "./schemas/primitive/nullable_type.ts";

// Record types
export {
  defineRecord,
  isRecordType,
  RecordType,
} from "./schemas/complex/record_type.ts";
export type {
  CustomTextSerializer,
  DefineRecordOptions,
  InferRecord,
  RecordTypeParams,
} from "./schemas/complex/record_type.ts";
export { RecordField } from "./schemas/complex/record_field.ts";
export type {
  FieldDescriptor,
  RecordFieldParams,
} from "./schemas/complex/record_field.ts";
export { isValidName, qualifyFieldName } from "./schemas/complex/field_names.ts";
export {
  CompiledWriterStrategy,
  defaultWriterStrategy,
  InterpretedWriterStrategy,
} from "./schemas/complex/record_writer_strategy.ts";
export type {
  CompiledFieldWriter,
  CompiledTextWriter,
  RecordWriterContext,
  RecordWriterStrategy,
} from "./schemas/complex/record_writer_strategy.ts";

// Schema utilities
export { throwInvalidError, ValidationError } from "./schemas/error.ts";
export type { ErrorHook } from "./schemas/error.ts";
export { safeStringify } from "./schemas/json.ts";

// Text buffers
export { TextBuffer } from "./serialization/buffers/text_buffer.ts";
export {
  TextOverflow,
  WriteBufferError,
} from "./serialization/buffers/buffer_error.ts";
export { TEXT_OVERFLOW, TextTap } from "./serialization/text_tap.ts";
export type { WriteResult } from "./serialization/text_tap.ts";

// Structured logging
export { StructuredLogger, truncateMessage } from "./logging/structured_logger.ts";
export type { DetailsParser, KeyValuePair } from "./logging/key_value.ts";
export {
  createRecordParser,
  createTextParser,
  describeKind,
  ParserRegistry,
  parseUnknownDetails,
} from "./logging/parsers.ts";
export type {
  ParserRegistryOptions,
  TextParserOptions,
} from "./logging/parsers.ts";
export { formatLogfmt } from "./logging/formatters.ts";
export type { LogFormatter } from "./logging/formatters.ts";
export {
  createFileSink,
  createPinoSink,
  createStreamSink,
} from "./logging/sinks.ts";
export type { FileSink, FileSinkOptions, LogSink } from "./logging/sinks.ts";
export {
  DEFAULT_MESSAGE_LIMIT,
  LoggerConfigError,
  resolveLoggerConfig,
} from "./logging/config.ts";
export type { LoggerConfig, ResolvedLoggerConfig } from "./logging/config.ts";
export { createDiagnostics } from "./logging/diagnostics.ts";
export type { DiagnosticsOptions } from "./logging/diagnostics.ts";

// Result helpers
export type { Result } from "./internal/result.ts";
