/**
 * @module core
 * @description Ambient layer shared by every arena module
 *
 * ## Modules
 * - `logging`: tick/event/report structured logging
 * - `errors`: unified error types and codes
 *
 * The Node.js file logger lives in `./logging-node` and is exported from
 * the `node` entry point only.
 */

// ==================== Logging ====================

export type {
    LogLevel,
    BaseLogEntry,
    PoseRecord,
    TickLogEntry,
    ArenaEventType,
    EventLogEntry,
    ReportLogEntry,
    LogEntry,
    TickLogInput,
    EventLogInput,
    ReportLogInput,
    Logger,
    LoggerConfig,
} from './logging';

export {
    DEFAULT_SCHEMA_VERSION,
    isLevelEnabled,
    ConsoleLogger,
    MemoryLogger,
    MultiLogger,
    createLogger,
} from './logging';

// ==================== Errors ====================

export {
    ErrorCodes,
    ArenaError,
    ValidationError,
    ConfigError,
    PlacementError,
    ParseError,
    NotFoundError,
    isArenaError,
    hasErrorCode,
    wrapError,
} from './errors';

export type {
    ErrorCode,
    PlacementConflict,
} from './errors';
