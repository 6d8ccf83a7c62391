/**
 * @module core/logging
 * @description Structured logging output for arena runs
 *
 * Provides tick-level, event-level, and report-level entries with a fixed,
 * versioned field schema.
 *
 * Browser-compatible: ConsoleLogger and MemoryLogger work in all environments.
 * Node.js only: Use `src/core/logging-node` for the file-based logger.
 */

// ==================== Types ====================

/**
 * Log level, ordered from most to least verbose
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_RANK: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
};

/**
 * Base log entry structure (all logs must include these fields)
 */
export interface BaseLogEntry {
    /** Schema version for compatibility */
    schemaVersion: string;
    /** Run identifier */
    run: string;
    /** Timestamp in milliseconds */
    timestamp: number;
}

/**
 * Pose snapshot as written to the log
 */
export interface PoseRecord {
    id: string;
    kind: 'autonomous' | 'remote';
    x: number;
    y: number;
    heading: number;
    isMoving: boolean;
}

/**
 * Tick-level log entry
 */
export interface TickLogEntry extends BaseLogEntry {
    logType: 'tick';
    tick: number;
    poses: PoseRecord[];
}

export type ArenaEventType =
    | 'obstacle-detected'
    | 'avoidance-turn'
    | 'safety-stop'
    | 'entity-placed'
    | 'placement-rejected'
    | 'import-warning'
    | 'scene-cleared'
    | 'simulation-started'
    | 'simulation-stopped';

/**
 * Discrete event log entry
 */
export interface EventLogEntry extends BaseLogEntry {
    logType: 'event';
    tick: number;
    event: ArenaEventType;
    level: LogLevel;
    message: string;
    entityId?: string;
    details?: Record<string, unknown>;
}

/**
 * Report-level log entry (final summary)
 */
export interface ReportLogEntry extends BaseLogEntry {
    logType: 'report';
    totalTicks: number;
    agents: number;
    obstacles: number;
    detections: number;
    avoidanceTurns: number;
    safetyStops: number;
    config: Record<string, unknown>;
}

/**
 * Union of all log entry types
 */
export type LogEntry = TickLogEntry | EventLogEntry | ReportLogEntry;

type Input<T extends LogEntry> = Omit<T, 'logType' | 'schemaVersion' | 'timestamp' | 'run'>;

export type TickLogInput = Input<TickLogEntry>;
export type EventLogInput = Input<EventLogEntry>;
export type ReportLogInput = Input<ReportLogEntry>;

/**
 * Logger interface
 */
export interface Logger {
    /** Log a tick */
    logTick(entry: TickLogInput): void;
    /** Log a discrete event */
    logEvent(entry: EventLogInput): void;
    /** Log final report */
    logReport(entry: ReportLogInput): void;
    /** Flush pending writes */
    flush(): void;
    /** Close the logger */
    close(): void;
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
    /** Run name (used for file naming) */
    run: string;
    /** Minimum level printed by console output */
    level?: LogLevel;
    /** Schema version */
    schemaVersion?: string;
    /** Output file path (Node.js only) */
    outputFile?: string;
    /** Whether to include tick-level logs (can be verbose) */
    logTicks?: boolean;
}

// ==================== Constants ====================

export const DEFAULT_SCHEMA_VERSION = '1.0.0';

/**
 * Check whether `level` passes the `threshold`
 */
export function isLevelEnabled(level: LogLevel, threshold: LogLevel): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[threshold];
}

/**
 * Resolve config defaults shared by every logger
 */
export function resolveLoggerConfig(config: LoggerConfig): Required<Pick<LoggerConfig, 'run' | 'schemaVersion' | 'logTicks'>> {
    return {
        run: config.run,
        schemaVersion: config.schemaVersion ?? DEFAULT_SCHEMA_VERSION,
        logTicks: config.logTicks ?? true,
    };
}

// ==================== Console Logger (Browser-compatible) ====================

function formatPose(pose: PoseRecord): string {
    return `${pose.id}@(${pose.x.toFixed(2)}, ${pose.y.toFixed(2)}) h=${pose.heading.toFixed(1)}`;
}

/**
 * Console Logger: Print to console (for debugging)
 * Works in both browser and Node.js environments.
 */
export class ConsoleLogger implements Logger {
    private level: LogLevel;

    constructor(levelOrConfig: LogLevel | LoggerConfig = 'info') {
        this.level = typeof levelOrConfig === 'string'
            ? levelOrConfig
            : levelOrConfig.level ?? 'info';
    }

    logTick(entry: TickLogInput): void {
        if (this.level === 'debug') {
            console.log(`[TICK] T${entry.tick}: ${entry.poses.map(formatPose).join(' ')}`);
        }
    }

    logEvent(entry: EventLogInput): void {
        if (!isLevelEnabled(entry.level, this.level)) return;

        const line = `[${entry.event.toUpperCase()}] T${entry.tick}: ${entry.message}`;
        if (entry.level === 'warn' || entry.level === 'error') {
            console.warn(line);
        } else {
            console.log(line);
        }
    }

    logReport(entry: ReportLogInput): void {
        console.log(
            `[REPORT] Ticks=${entry.totalTicks}, ` +
            `Agents=${entry.agents}, Obstacles=${entry.obstacles}, ` +
            `Turns=${entry.avoidanceTurns}, Stops=${entry.safetyStops}`
        );
    }

    flush(): void { /* no-op */ }
    close(): void { /* no-op */ }
}

// ==================== Memory Logger (Browser-compatible) ====================

/**
 * Memory Logger: Store logs in memory
 * Works in both browser and Node.js environments.
 * Useful for testing and for presentation layers that replay a run.
 */
export class MemoryLogger implements Logger {
    private config: ReturnType<typeof resolveLoggerConfig>;
    public ticks: TickLogEntry[] = [];
    public events: EventLogEntry[] = [];
    public reports: ReportLogEntry[] = [];

    constructor(config: LoggerConfig) {
        this.config = resolveLoggerConfig(config);
    }

    private createBaseEntry(): BaseLogEntry {
        return {
            schemaVersion: this.config.schemaVersion,
            run: this.config.run,
            timestamp: Date.now(),
        };
    }

    logTick(entry: TickLogInput): void {
        if (!this.config.logTicks) return;
        this.ticks.push({
            ...this.createBaseEntry(),
            logType: 'tick',
            ...entry,
        });
    }

    logEvent(entry: EventLogInput): void {
        this.events.push({
            ...this.createBaseEntry(),
            logType: 'event',
            ...entry,
        });
    }

    logReport(entry: ReportLogInput): void {
        this.reports.push({
            ...this.createBaseEntry(),
            logType: 'report',
            ...entry,
        });
    }

    /** Get all logs */
    getAllLogs(): LogEntry[] {
        return [...this.ticks, ...this.events, ...this.reports];
    }

    /** Export to JSONL string */
    toJSONL(): string {
        return this.getAllLogs().map(entry => JSON.stringify(entry)).join('\n');
    }

    clear(): void {
        this.ticks = [];
        this.events = [];
        this.reports = [];
    }

    flush(): void { /* no-op for memory logger */ }
    close(): void { /* no-op for memory logger */ }
}

// ==================== Multi-Logger (Browser-compatible) ====================

/**
 * Multi-Logger: Write to multiple loggers simultaneously
 */
export class MultiLogger implements Logger {
    private loggers: Logger[];

    constructor(loggers: Logger[]) {
        this.loggers = loggers;
    }

    logTick(entry: TickLogInput): void {
        for (const logger of this.loggers) {
            logger.logTick(entry);
        }
    }

    logEvent(entry: EventLogInput): void {
        for (const logger of this.loggers) {
            logger.logEvent(entry);
        }
    }

    logReport(entry: ReportLogInput): void {
        for (const logger of this.loggers) {
            logger.logReport(entry);
        }
    }

    flush(): void {
        for (const logger of this.loggers) {
            logger.flush();
        }
    }

    close(): void {
        for (const logger of this.loggers) {
            logger.close();
        }
    }
}

// ==================== Factory Functions ====================

/**
 * Create a logger based on format (browser-compatible)
 */
export function createLogger(
    format: 'console' | 'memory',
    config: LoggerConfig
): Logger {
    switch (format) {
        case 'console':
            return new ConsoleLogger(config);
        case 'memory':
            return new MemoryLogger(config);
    }
}
