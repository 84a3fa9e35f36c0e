export type Clock = () => number;

export type AttendanceStatus =
    | 'Check-in'
    | 'Check-out'
    | 'Break-out'
    | 'Break-in'
    | 'Overtime-in'
    | 'Overtime-out'
    | 'Error'
    | 'Unknown';

/**
 * One attendance line as read off the wire, before it is bound to a device.
 */
export interface AttendanceCandidate {
    userId: string;
    timestamp: string;
    statusCode: string;
    status: AttendanceStatus;
    verification?: string;
    workCode?: string;
    rawLine: string;
}

export interface IdentityFact {
    key: string;
    value: string;
}

export type ParsedLine =
    | { kind: 'attendance'; candidate: AttendanceCandidate }
    | { kind: 'identity'; fact: IdentityFact }
    | { kind: 'unrecognized'; line: string };

export type AttendanceEvent = Readonly<{
    id: number;
    deviceId: string;
    userId: string;
    timestamp: string;
    statusCode: string;
    status: AttendanceStatus;
    verification?: string;
    workCode?: string;
    receivedAt: string;
    rawLine: string;
}>;

export interface Device {
    deviceId: string;
    firstSeenAt: number;
    lastSeenAt: number;
    ipAddress: string | null;
    displayName: string;
    paramBag: Record<string, string>;
    recordCount: number;
    commsCount: number;
    /** Liveness as last reported by the sweep; `online` is derived at read time. */
    connected: boolean;
}

export interface DeviceView extends Device {
    online: boolean;
    queueLength: number;
}

export interface CommandQueueEntry {
    command: string;
    enqueuedAt: number;
}

export type QueueState = 'EMPTY' | 'HAS_PENDING';

export interface FetchCampaign {
    deviceId: string;
    startedAt: number;
    attempts: number;
    lastAttemptAt: number;
    lastRecordCount: number;
    lastProgressAt: number | null;
}

export interface RecordFilter {
    deviceId?: string;
    userId?: string;
    /** Inclusive lower bound, compared against the normalized device timestamp. */
    from?: string;
    /** Inclusive upper bound; a date-only bound covers the whole day. */
    to?: string;
}

export interface RecordQuery extends RecordFilter {
    offset: number;
    limit: number;
}

export interface RecordPage {
    total: number;
    records: AttendanceEvent[];
}

export type InsertResult =
    | { status: 'inserted'; event: AttendanceEvent }
    | { status: 'duplicate'; existing: AttendanceEvent };

/**
 * Durable home of attendance history. Implementations must make the
 * existence check and the insert a single step.
 */
export interface RecordStore {
    insertIfAbsent(event: Omit<AttendanceEvent, 'id'>): Promise<InsertResult>;
    queryByFilter(query: RecordQuery): Promise<RecordPage>;
    count(filter?: RecordFilter): Promise<number>;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
    at: string;
    level: LogLevel;
    message: string;
    deviceId?: string;
}

export interface LogSink {
    append(level: LogLevel, message: string, deviceId?: string): void;
}

export interface Flushable {
    flush(): Promise<boolean>;
}
