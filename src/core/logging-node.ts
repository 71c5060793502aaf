/**
 * @module core/logging-node
 * @description File-based JSONL logger (Node.js only)
 */

import * as fs from 'fs';
import * as path from 'path';
import {
    DEFAULT_SCHEMA_VERSION,
    type BaseLogEntry,
    type EpisodeInput,
    type EventInput,
    type LogEntry,
    type Logger,
    type LoggerConfig,
    type StepInput,
} from './logging';

export interface JsonlLoggerConfig extends LoggerConfig {
    /** Directory the `<env>.jsonl` file is written to */
    outputDir: string;
    /** Entries buffered before an automatic flush */
    bufferSize?: number;
}

/**
 * JSONL Logger: one JSON object per line, appended to `<outputDir>/<env>.jsonl`
 */
export class JsonlLogger implements Logger {
    readonly filePath: string;
    private readonly env: string;
    private readonly schemaVersion: string;
    private readonly bufferSize: number;
    private buffer: string[] = [];
    private closed = false;

    constructor(config: JsonlLoggerConfig) {
        this.env = config.env;
        this.schemaVersion = config.schemaVersion ?? DEFAULT_SCHEMA_VERSION;
        this.bufferSize = config.bufferSize ?? 100;

        fs.mkdirSync(config.outputDir, { recursive: true });
        this.filePath = path.join(config.outputDir, `${config.env}.jsonl`);
    }

    private base(): BaseLogEntry {
        return { schemaVersion: this.schemaVersion, env: this.env, timestamp: Date.now() };
    }

    private write(entry: LogEntry): void {
        if (this.closed) {
            throw new Error(`JsonlLogger for ${this.filePath} is closed`);
        }
        this.buffer.push(JSON.stringify(entry));
        if (this.buffer.length >= this.bufferSize) {
            this.flush();
        }
    }

    logEvent(entry: EventInput): void {
        this.write({ ...this.base(), logType: 'event', ...entry });
    }

    logStep(entry: StepInput): void {
        this.write({ ...this.base(), logType: 'step', ...entry });
    }

    logEpisode(entry: EpisodeInput): void {
        this.write({ ...this.base(), logType: 'episode', ...entry });
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
