/**
 * MongoDB JSON Store
 *
 * JSON-in/JSON-out CRUD against a single MongoDB collection:
 * - Configuration from code or environment
 * - Connection handling with a fail-fast ping
 * - Extended JSON conversion and tagged result values
 * - Per-operation deadlines and caller cancellation
 * - Error classification
 * - Logging and metrics through injected collectors
 *
 * @module mongodb-json-store
 * @version 1.0.0
 */

// ============================================================================
// Configuration
// ============================================================================

export {
  type ConnectionOptions,
  type JsonStoreConfig,
  JsonStoreConfigBuilder,
  type ReadPreferenceMode,
  SecretString,
  DEFAULT_CONNECTION_OPTIONS,
  DEFAULT_TIMEOUT_SECONDS,
  MAX_OPERATION_TIMEOUT_MS,
} from './config/index.js';

// ============================================================================
// Types
// ============================================================================

export {
  type DeleteResult,
  type Document,
  type FieldKind,
  type FieldValue,
  type Filter,
  type Identifier,
  type JsonPayload,
  type OrderedDocument,
  type TaggedDocument,
  type UpdateResult,
  OBJECT_ID_PATTERN,
  isOperatorDocument,
  isPlainDocument,
} from './types/index.js';

// ============================================================================
// Codec
// ============================================================================

export {
  parseDocument,
  parseIdentifier,
  parseOrderedDocument,
  parseUpdateDocument,
  stringifyDocument,
  tagDocument,
  tagValue,
  untagDocument,
  untagValue,
} from './codec/index.js';

// ============================================================================
// Errors
// ============================================================================

export {
  MongoDBError,
  MongoDBErrorCode,
  ConfigurationError,
  InvalidConnectionStringError,
  ConnectionFailedError,
  MalformedPayloadError,
  StoreOperationFailedError,
  CursorIterationError,
  NotFoundError,
  AuthenticationError,
  ConnectionTimeoutError,
  NetworkError,
  TimeoutError,
  OperationAbortedError,
  ServerSelectionFailedError,
  WriteError,
  DuplicateKeyError,
  CursorNotFoundError,
  NotPrimaryError,
  ServerError,
  parseMongoDBError,
  isMongoDBError,
  isRetryableError,
} from './errors/index.js';

// ============================================================================
// Observability
// ============================================================================

export {
  LogLevel,
  type LogEntry,
  type Logger,
  ConsoleLogger,
  NoopLogger,
  InMemoryLogger,
  MetricNames,
  type MetricName,
  type MetricEntry,
  type MetricsCollector,
  NoopMetricsCollector,
  InMemoryMetricsCollector,
  type Observability,
  createNoopObservability,
  createConsoleObservability,
} from './observability/index.js';

// ============================================================================
// Client
// ============================================================================

export {
  type DriverCollection,
  type DriverConnection,
  type DriverConnectionFactory,
  type DriverCursor,
  type DriverReadOptions,
  MongoDBClient,
  NativeDriverConnection,
  createNativeConnection,
} from './client/index.js';

// ============================================================================
// Services
// ============================================================================

export {
  JsonDocumentStore,
  type JsonDocumentStoreOptions,
  type OperationOptions,
  type StoreOperation,
  Deadline,
  withDeadline,
} from './services/index.js';

// ============================================================================
// Testing
// ============================================================================

export {
  InMemoryDriverConnection,
  type DriverMethod,
  type RecordedCall,
  matchesFilter,
  applyUpdate,
} from './testing/index.js';
