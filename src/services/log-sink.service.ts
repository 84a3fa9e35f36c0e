import { Clock, LogEntry, LogLevel, LogSink } from '../types';
import logger from '../utils/logger';

/**
 * Device-facing activity log. Every entry goes to winston and into a bounded
 * in-memory history that the dashboard reads and the persistence layer saves.
 */
export class LogSinkService implements LogSink {
    private entries: LogEntry[] = [];
    private revisionCounter = 0;

    constructor(
        private readonly maxEntries: number,
        private readonly clock: Clock = Date.now
    ) {}

    append(level: LogLevel, message: string, deviceId?: string): void {
        const entry: LogEntry = {
            at: new Date(this.clock()).toISOString(),
            level,
            message,
        };
        if (deviceId) entry.deviceId = deviceId;

        logger.log(level, message, deviceId ? { deviceId } : {});

        this.entries.push(entry);
        this.prune();
        this.revisionCounter++;
    }

    /**
     * Most recent entries, oldest first
     */
    recent(limit = 100, deviceId?: string): LogEntry[] {
        const matching = deviceId
            ? this.entries.filter((entry) => entry.deviceId === deviceId)
            : this.entries;
        return matching.slice(-limit);
    }

    get size(): number {
        return this.entries.length;
    }

    get revision(): number {
        return this.revisionCounter;
    }

    snapshot(): LogEntry[] {
        return [...this.entries];
    }

    restore(entries: LogEntry[]): void {
        this.entries = [...entries];
        this.prune();
    }

    private prune(): void {
        if (this.maxEntries > 0 && this.entries.length > this.maxEntries) {
            this.entries.splice(0, this.entries.length - this.maxEntries);
        }
    }
}
