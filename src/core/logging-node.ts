/**
 * @module core/logging-node
 * @description File-based JSONL logger (Node.js only)
 */

import * as fs from 'fs';
import * as path from 'path';
import {
    resolveLoggerConfig,
    type BaseLogEntry,
    type LogEntry,
    type Logger,
    type LoggerConfig,
    type TickLogInput,
    type EventLogInput,
    type ReportLogInput,
} from './logging';

const DEFAULT_BUFFER_SIZE = 256;

/**
 * JSONL Logger: one JSON object per line, appended to `outputFile`
 *
 * Entries are buffered and written on flush, on close, or whenever the
 * buffer reaches `bufferSize` lines.
 */
export class JsonlFileLogger implements Logger {
    readonly filePath: string;
    private config: ReturnType<typeof resolveLoggerConfig>;
    private buffer: string[] = [];
    private bufferSize: number;
    private closed = false;

    constructor(config: LoggerConfig & { outputFile: string; bufferSize?: number }) {
        this.config = resolveLoggerConfig(config);
        this.filePath = path.resolve(config.outputFile);
        this.bufferSize = config.bufferSize ?? DEFAULT_BUFFER_SIZE;

        fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
        fs.writeFileSync(this.filePath, '');
    }

    private base(): BaseLogEntry {
        return {
            schemaVersion: this.config.schemaVersion,
            run: this.config.run,
            timestamp: Date.now(),
        };
    }

    private push(entry: LogEntry): void {
        if (this.closed) return;
        this.buffer.push(JSON.stringify(entry));
        if (this.buffer.length >= this.bufferSize) {
            this.flush();
        }
    }

    logTick(entry: TickLogInput): void {
        if (!this.config.logTicks) return;
        this.push({ ...this.base(), logType: 'tick', ...entry });
    }

    logEvent(entry: EventLogInput): void {
        this.push({ ...this.base(), logType: 'event', ...entry });
    }

    logReport(entry: ReportLogInput): void {
        this.push({ ...this.base(), logType: 'report', ...entry });
    }

    flush(): void {
        if (this.buffer.length === 0) return;
        fs.appendFileSync(this.filePath, this.buffer.join('\n') + '\n');
        this.buffer = [];
    }

    close(): void {
        if (this.closed) return;
        this.flush();
        this.closed = true;
    }
}
