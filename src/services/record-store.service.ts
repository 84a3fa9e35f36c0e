import {
    AttendanceEvent,
    InsertResult,
    RecordFilter,
    RecordPage,
    RecordQuery,
    RecordStore,
} from '../types';
import { normalizeTimestamp } from '../utils/line-parser';

type EventIdentity = Pick<AttendanceEvent, 'deviceId' | 'userId' | 'timestamp' | 'statusCode'>;

/**
 * Identity of an attendance occurrence. Two events with the same key are the same punch.
 */
export function eventKey(event: EventIdentity): string {
    return [event.deviceId, event.userId, event.timestamp, event.statusCode].join('\u0000');
}

function matches(event: AttendanceEvent, filter: RecordFilter): boolean {
    if (filter.deviceId && event.deviceId !== filter.deviceId) return false;
    if (filter.userId && event.userId !== filter.userId) return false;
    if (filter.from && event.timestamp < normalizeTimestamp(filter.from)) return false;
    if (filter.to) {
        const to = normalizeTimestamp(filter.to);
        if (event.timestamp.slice(0, to.length) > to) return false;
    }
    return true;
}

/**
 * Attendance history held in memory, indexed by identity key.
 *
 * Retention: once more than `maxRecords` events are held, the oldest are
 * dropped together with their keys (0 keeps everything).
 */
export class MemoryRecordStore implements RecordStore {
    private records: AttendanceEvent[] = [];
    private index = new Map<string, AttendanceEvent>();
    private nextId = 1;
    private revisionCounter = 0;

    constructor(private readonly maxRecords = 0) {}

    async insertIfAbsent(event: Omit<AttendanceEvent, 'id'>): Promise<InsertResult> {
        const key = eventKey(event);
        const existing = this.index.get(key);
        if (existing) {
            return { status: 'duplicate', existing };
        }

        const stored: AttendanceEvent = Object.freeze({ ...event, id: this.nextId++ });
        this.records.push(stored);
        this.index.set(key, stored);
        this.prune();
        this.revisionCounter++;

        return { status: 'inserted', event: stored };
    }

    async queryByFilter(query: RecordQuery): Promise<RecordPage> {
        const matching = this.records.filter((event) => matches(event, query));
        return {
            total: matching.length,
            records: matching.slice(query.offset, query.offset + query.limit),
        };
    }

    async count(filter: RecordFilter = {}): Promise<number> {
        if (!filter.deviceId && !filter.userId && !filter.from && !filter.to) {
            return this.records.length;
        }
        return this.records.filter((event) => matches(event, filter)).length;
    }

    async all(): Promise<AttendanceEvent[]> {
        return [...this.records];
    }

    get revision(): number {
        return this.revisionCounter;
    }

    snapshot(): AttendanceEvent[] {
        return [...this.records];
    }

    /**
     * Replace the contents with previously saved events. Later duplicates are dropped.
     */
    restore(events: AttendanceEvent[]): void {
        this.records = [];
        this.index.clear();
        this.nextId = 1;

        for (const event of events) {
            const key = eventKey(event);
            if (this.index.has(key)) continue;

            const stored: AttendanceEvent = Object.freeze({ ...event });
            this.records.push(stored);
            this.index.set(key, stored);
            this.nextId = Math.max(this.nextId, stored.id + 1);
        }
        this.prune();
    }

    private prune(): void {
        if (this.maxRecords <= 0 || this.records.length <= this.maxRecords) {
            return;
        }

        const dropped = this.records.splice(0, this.records.length - this.maxRecords);
        for (const event of dropped) {
            this.index.delete(eventKey(event));
        }
    }
}
