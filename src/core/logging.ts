/**
 * @module core/logging
 * @description Structured logging for adapter steps and episodes
 *
 * Provides console and in-memory loggers with fixed field schemas (versioned,
 * append-only). Adapters emit one step entry per control step plus event
 * entries for notable conditions (out-of-bounds observations, fatal errors).
 *
 * Browser-compatible: ConsoleLogger and MemoryLogger work in all environments.
 * Node.js only: JsonlLogger lives in `core/logging-node`.
 */

// ==================== Types ====================

/**
 * Log level for console output
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_RANK: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
};

/**
 * Whether a message at `level` passes a logger set to `threshold`
 */
export function isLevelEnabled(level: LogLevel, threshold: LogLevel): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[threshold];
}

/**
 * Base log entry structure (all logs must include these fields)
 */
export interface BaseLogEntry {
    /** Schema version for compatibility */
    schemaVersion: string;
    /** Environment variant name */
    env: string;
    /** Timestamp in milliseconds */
    timestamp: number;
}

/**
 * Free-form event (warnings, fatal errors)
 */
export interface EventLogEntry extends BaseLogEntry {
    logType: 'event';
    level: LogLevel;
    message: string;
    details?: unknown;
}

/**
 * Step-level log entry
 *
 * Adapters log each stage as it completes, so a single step may produce an
 * observation entry, a command entry and a reward entry.
 */
export interface StepLogEntry extends BaseLogEntry {
    logType: 'step';
    step: number;
    episode?: number;
    observation?: unknown;
    action?: readonly number[];
    commands?: unknown;
    reward?: number;
    rewardBreakdown?: Record<string, number>;
    done?: boolean;
    truncated?: boolean;
}

/**
 * Episode-level summary log entry
 */
export interface EpisodeLogEntry extends BaseLogEntry {
    logType: 'episode';
    episode: number;
    totalSteps: number;
    totalReward: number;
    avgReward: number;
    terminated: boolean;
}

/**
 * Union of all log entry types
 */
export type LogEntry = EventLogEntry | StepLogEntry | EpisodeLogEntry;

type EntryInput<T extends BaseLogEntry> = Omit<T, 'logType' | 'schemaVersion' | 'timestamp' | 'env'>;

export type EventInput = EntryInput<EventLogEntry>;
export type StepInput = EntryInput<StepLogEntry>;
export type EpisodeInput = EntryInput<EpisodeLogEntry>;

/**
 * Logger interface
 */
export interface Logger {
    /** Log a free-form event */
    logEvent(entry: EventInput): void;
    /** Log a step stage */
    logStep(entry: StepInput): void;
    /** Log episode summary */
    logEpisode(entry: EpisodeInput): void;
    /** Flush pending writes */
    flush(): void;
    /** Close the logger */
    close(): void;
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
    /** Environment variant name stamped on every entry */
    env: string;
    /** Minimum level printed by console loggers */
    level?: LogLevel;
    /** Schema version */
    schemaVersion?: string;
}

// ==================== Constants ====================

export const DEFAULT_SCHEMA_VERSION = '1.0.0';

function formatValue(value: unknown): string {
    if (typeof value === 'string') return value;
    return JSON.stringify(value);
}

// ==================== Console Logger (Browser-compatible) ====================

/**
 * Console Logger: Print to console (for debugging)
 */
export class ConsoleLogger implements Logger {
    private level: LogLevel;
    private env: string;

    constructor(levelOrConfig: LogLevel | LoggerConfig = 'info') {
        if (typeof levelOrConfig === 'string') {
            this.level = levelOrConfig;
            this.env = 'unknown';
        } else {
            this.level = levelOrConfig.level ?? 'info';
            this.env = levelOrConfig.env;
        }
    }

    logEvent(entry: EventInput): void {
        if (!isLevelEnabled(entry.level, this.level)) return;

        const line = `[${entry.level.toUpperCase()}] ${this.env}: ${entry.message}`;
        if (entry.level === 'error') {
            console.error(line);
        } else if (entry.level === 'warn') {
            console.warn(line);
        } else {
            console.log(line);
        }
    }

    logStep(entry: StepInput): void {
        if (isLevelEnabled('debug', this.level)) {
            if (entry.observation !== undefined) {
                console.log(`Observation --> ${formatValue(entry.observation)}`);
            }
            if (entry.commands !== undefined) {
                console.log(`Action --> ${formatValue(entry.commands)}`);
            }
        }
        if (entry.reward !== undefined && isLevelEnabled('info', this.level)) {
            const episode = entry.episode !== undefined ? `E${entry.episode} ` : '';
            console.log(`[STEP] ${episode}S${entry.step}: reward=${entry.reward.toFixed(3)}`);
        }
    }

    logEpisode(entry: EpisodeInput): void {
        if (isLevelEnabled('info', this.level)) {
            console.log(
                `[EPISODE] E${entry.episode}: steps=${entry.totalSteps}, ` +
                `reward=${entry.totalReward.toFixed(3)}, terminated=${entry.terminated}`
            );
        }
    }

    flush(): void { /* no-op */ }
    close(): void { /* no-op */ }
}

// ==================== Memory Logger (Browser-compatible) ====================

/**
 * Memory Logger: Store logs in memory
 * Useful for testing and for feeding report views.
 */
export class MemoryLogger implements Logger {
    private config: { env: string; schemaVersion: string };
    public events: EventLogEntry[] = [];
    public steps: StepLogEntry[] = [];
    public episodes: EpisodeLogEntry[] = [];

    constructor(config: LoggerConfig) {
        this.config = {
            env: config.env,
            schemaVersion: config.schemaVersion ?? DEFAULT_SCHEMA_VERSION,
        };
    }

    private createBaseEntry(): BaseLogEntry {
        return {
            schemaVersion: this.config.schemaVersion,
            env: this.config.env,
            timestamp: Date.now(),
        };
    }

    logEvent(entry: EventInput): void {
        this.events.push({ ...this.createBaseEntry(), logType: 'event', ...entry });
    }

    logStep(entry: StepInput): void {
        this.steps.push({ ...this.createBaseEntry(), logType: 'step', ...entry });
    }

    logEpisode(entry: EpisodeInput): void {
        this.episodes.push({ ...this.createBaseEntry(), logType: 'episode', ...entry });
    }

    /** Get all logs */
    getAllLogs(): LogEntry[] {
        return [...this.events, ...this.steps, ...this.episodes];
    }

    /** Export to JSONL string */
    toJSONL(): string {
        return this.getAllLogs().map(entry => JSON.stringify(entry)).join('\n');
    }

    clear(): void {
        this.events = [];
        this.steps = [];
        this.episodes = [];
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

    logEvent(entry: EventInput): void {
        for (const logger of this.loggers) {
            logger.logEvent(entry);
        }
    }

    logStep(entry: StepInput): void {
        for (const logger of this.loggers) {
            logger.logStep(entry);
        }
    }

    logEpisode(entry: EpisodeInput): void {
        for (const logger of this.loggers) {
            logger.logEpisode(entry);
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
