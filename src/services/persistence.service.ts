import fs from 'fs';
import path from 'path';
import { AttendanceEvent, Device, Flushable, LogEntry, LogLevel } from '../types';
import { errorMessage } from '../utils/errors';
import { MemoryRecordStore } from './record-store.service';
import { DeviceRegistryService } from './device-registry.service';
import { LogSinkService } from './log-sink.service';

const ATTENDANCE_FILE = 'attendance.json';
const DEVICES_FILE = 'devices.json';
const LOG_FILE = 'device-logs.txt';

const LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error'];

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isAttendanceEvent(value: unknown): value is AttendanceEvent {
    return (
        isRecord(value) &&
        typeof value.id === 'number' &&
        typeof value.deviceId === 'string' &&
        typeof value.userId === 'string' &&
        typeof value.timestamp === 'string' &&
        typeof value.statusCode === 'string' &&
        typeof value.status === 'string' &&
        typeof value.receivedAt === 'string' &&
        typeof value.rawLine === 'string'
    );
}

function isDevice(value: unknown): value is Device {
    return (
        isRecord(value) &&
        typeof value.deviceId === 'string' &&
        typeof value.firstSeenAt === 'number' &&
        typeof value.lastSeenAt === 'number' &&
        (typeof value.ipAddress === 'string' || value.ipAddress === null) &&
        typeof value.displayName === 'string' &&
        isRecord(value.paramBag) &&
        typeof value.recordCount === 'number' &&
        typeof value.commsCount === 'number'
    );
}

function isLogLevel(value: string): value is LogLevel {
    return LEVELS.some((level) => level === value);
}

/**
 * Device log lines are stored as tab-separated `at, level, deviceId, message`.
 */
function formatLogLine(entry: LogEntry): string {
    return [entry.at, entry.level, entry.deviceId ?? '', entry.message.replace(/[\r\n\t]+/g, ' ')].join('\t');
}

function parseLogLine(line: string): LogEntry | null {
    const [at, level, deviceId, ...rest] = line.split('\t');
    if (!at || !level || !isLogLevel(level) || rest.length === 0) {
        return null;
    }

    const entry: LogEntry = { at, level, message: rest.join(' ') };
    if (deviceId) entry.deviceId = deviceId;
    return entry;
}

export interface PersistenceTargets {
    records: MemoryRecordStore;
    registry: DeviceRegistryService;
    logs: LogSinkService;
}

/**
 * Saves in-memory state to flat files. Each file is written to a temporary
 * path first and renamed over the old one, so an interrupted write leaves the
 * previous version intact. A failed flush keeps serving from memory and is
 * retried by the next one.
 */
export class PersistenceService implements Flushable {
    private flushing: Promise<boolean> = Promise.resolve(true);
    private saved = { records: -1, devices: -1, logs: -1 };

    constructor(
        private readonly dir: string,
        private readonly targets: PersistenceTargets
    ) {}

    async load(): Promise<void> {
        const { records, registry, logs } = this.targets;

        const attendance = await this.readJson(ATTENDANCE_FILE);
        if (isRecord(attendance) && Array.isArray(attendance.records)) {
            records.restore(attendance.records.filter(isAttendanceEvent));
            logs.append('info', `Loaded ${await records.count()} attendance records`);
        }

        const devices = await this.readJson(DEVICES_FILE);
        if (isRecord(devices) && Array.isArray(devices.devices)) {
            registry.restore(devices.devices.filter(isDevice));
            logs.append('info', `Loaded ${registry.size} devices`);
        }

        const logText = await this.readText(LOG_FILE);
        if (logText !== null) {
            const saved = logText
                .split('\n')
                .map(parseLogLine)
                .filter((entry): entry is LogEntry => entry !== null);
            logs.restore([...saved, ...logs.snapshot()]);
        }

        this.saved = { records: records.revision, devices: registry.revision, logs: logs.revision };
    }

    /**
     * Write whatever changed since the last successful flush. Never rejects.
     */
    flush(): Promise<boolean> {
        this.flushing = this.flushing.then(() => this.writeChanged());
        return this.flushing;
    }

    private async writeChanged(): Promise<boolean> {
        const { records, registry, logs } = this.targets;

        try {
            await fs.promises.mkdir(this.dir, { recursive: true });

            const recordsRevision = records.revision;
            if (recordsRevision !== this.saved.records) {
                await this.writeAtomic(
                    ATTENDANCE_FILE,
                    JSON.stringify({ savedAt: new Date().toISOString(), records: records.snapshot() }, null, 2)
                );
                this.saved.records = recordsRevision;
            }

            const devicesRevision = registry.revision;
            if (devicesRevision !== this.saved.devices) {
                await this.writeAtomic(
                    DEVICES_FILE,
                    JSON.stringify({ savedAt: new Date().toISOString(), devices: registry.snapshot() }, null, 2)
                );
                this.saved.devices = devicesRevision;
            }

            const logsRevision = logs.revision;
            if (logsRevision !== this.saved.logs) {
                const lines = logs.snapshot().map(formatLogLine);
                await this.writeAtomic(LOG_FILE, lines.length > 0 ? lines.join('\n') + '\n' : '');
                this.saved.logs = logsRevision;
            }

            return true;
        } catch (error) {
            logs.append('error', `Failed to persist state to ${this.dir}: ${errorMessage(error)}`);
            return false;
        }
    }

    private async writeAtomic(file: string, content: string): Promise<void> {
        const target = path.join(this.dir, file);
        const temp = `${target}.${process.pid}.tmp`;
        await fs.promises.writeFile(temp, content, 'utf-8');
        await fs.promises.rename(temp, target);
    }

    private async readText(file: string): Promise<string | null> {
        try {
            return await fs.promises.readFile(path.join(this.dir, file), 'utf-8');
        } catch (error) {
            if (isRecord(error) && error.code === 'ENOENT') {
                return null;
            }
            throw error;
        }
    }

    private async readJson(file: string): Promise<unknown> {
        const text = await this.readText(file);
        if (text === null) {
            return null;
        }

        try {
            const parsed: unknown = JSON.parse(text);
            return parsed;
        } catch (error) {
            this.targets.logs.append('error', `Ignoring unreadable ${file}: ${errorMessage(error)}`);
            return null;
        }
    }
}
