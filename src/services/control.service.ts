import { AttendanceEvent, Clock, DeviceView, LogEntry, RecordPage, RecordQuery, RecordStore } from '../types';
import { DeviceRegistryService } from './device-registry.service';
import { CommandDispatcherService, FORCE_FETCH_ALL } from './command-dispatcher.service';
import { LogSinkService } from './log-sink.service';
import { AutonomousPoller } from '../jobs/autonomous-poller.job';

export type ExportFormat = 'csv' | 'json';

export interface ExportFile {
    filename: string;
    contentType: string;
    body: string;
}

export type EnqueueResult =
    | { status: 'queued'; queueLength: number }
    | { status: 'queue-full'; queueLength: number }
    | { status: 'unknown-device' };

export interface AttendanceStats {
    totalRecords: number;
    todayRecords: number;
    uniqueUsers: number;
    devices: number;
    onlineDevices: number;
}

const CSV_HEADER = ['Device ID', 'User ID', 'Timestamp', 'Status', 'Status Text', 'Verification', 'Workcode', 'Received At'];

function csvCell(value: string): string {
    return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

function csvRow(cells: string[]): string {
    return cells.map(csvCell).join(',');
}

function fileStamp(date: Date): string {
    return date.toISOString().replace(/[-:]/g, '').replace('T', '_').slice(0, 15);
}

export interface ControlServiceDeps {
    registry: DeviceRegistryService;
    dispatcher: CommandDispatcherService;
    poller: AutonomousPoller;
    store: RecordStore;
    logs: LogSinkService;
    clock?: Clock;
}

/**
 * Operator-facing control surface: queue commands, trigger full fetches,
 * inspect devices and export attendance.
 */
export class ControlService {
    private readonly clock: Clock;

    constructor(private readonly deps: ControlServiceDeps) {
        this.clock = deps.clock ?? Date.now;
    }

    enqueueCommand(deviceId: string, command: string): EnqueueResult {
        const { registry, dispatcher, logs } = this.deps;
        if (!registry.has(deviceId)) {
            return { status: 'unknown-device' };
        }

        if (command.trim().toUpperCase() === FORCE_FETCH_ALL) {
            this.forceFullFetch(deviceId);
            return { status: 'queued', queueLength: dispatcher.size(deviceId) };
        }

        if (!dispatcher.enqueue(deviceId, command)) {
            return { status: 'queue-full', queueLength: dispatcher.size(deviceId) };
        }

        logs.append('info', `Operator queued: ${command.trim()}`, deviceId);
        return { status: 'queued', queueLength: dispatcher.size(deviceId) };
    }

    /**
     * Queue a command for every known device; returns the devices that accepted it
     */
    broadcastCommand(command: string): string[] {
        return this.deps.registry
            .list()
            .filter((device) => this.enqueueCommand(device.deviceId, command).status === 'queued')
            .map((device) => device.deviceId);
    }

    /**
     * Replace the queue with the fetch-all sequence and start a retry campaign.
     * Without a device id every known device is targeted.
     */
    forceFullFetch(deviceId?: string): string[] {
        const { registry, dispatcher, poller } = this.deps;
        const targets = deviceId ? [deviceId].filter((id) => registry.has(id)) : registry.list().map((d) => d.deviceId);

        for (const target of targets) {
            dispatcher.forceFetchAll(target);
            poller.startCampaign(target);
        }
        return targets;
    }

    clearQueue(deviceId: string): number {
        const removed = this.deps.dispatcher.clear(deviceId);
        if (removed > 0) {
            this.deps.logs.append('info', `Operator cleared ${removed} queued commands`, deviceId);
        }
        return removed;
    }

    listDevices(): DeviceView[] {
        return this.deps.registry
            .list()
            .map((device) => this.view(device.deviceId))
            .filter((view): view is DeviceView => view !== undefined);
    }

    getDevice(deviceId: string): DeviceView | undefined {
        return this.view(deviceId);
    }

    pendingCommands(deviceId: string): string[] {
        return this.deps.dispatcher.pending(deviceId).map((entry) => entry.command);
    }

    queryRecords(query: RecordQuery): Promise<RecordPage> {
        return this.deps.store.queryByFilter(query);
    }

    async exportRecords(format: ExportFormat): Promise<ExportFile> {
        const records = await this.allRecords();
        const stamp = fileStamp(new Date(this.clock()));

        if (format === 'json') {
            return {
                filename: `attendance_${stamp}.json`,
                contentType: 'application/json',
                body: JSON.stringify(records, null, 2),
            };
        }

        const rows = records.map((record) =>
            csvRow([
                record.deviceId,
                record.userId,
                record.timestamp,
                record.statusCode,
                record.status,
                record.verification ?? '',
                record.workCode ?? '',
                record.receivedAt,
            ])
        );
        return {
            filename: `attendance_${stamp}.csv`,
            contentType: 'text/csv',
            body: [csvRow(CSV_HEADER), ...rows].join('\n') + '\n',
        };
    }

    async stats(): Promise<AttendanceStats> {
        const records = await this.allRecords();
        const today = new Date(this.clock()).toISOString().slice(0, 10);
        const devices = this.deps.registry.list();

        return {
            totalRecords: records.length,
            todayRecords: records.filter((record) => record.timestamp.startsWith(today)).length,
            uniqueUsers: new Set(records.map((record) => record.userId)).size,
            devices: devices.length,
            onlineDevices: devices.filter((device) => this.deps.registry.isOnline(device)).length,
        };
    }

    recentLogs(limit: number, deviceId?: string): LogEntry[] {
        return this.deps.logs.recent(limit, deviceId);
    }

    private async allRecords(): Promise<AttendanceEvent[]> {
        const { store } = this.deps;
        const total = await store.count();
        const page = await store.queryByFilter({ offset: 0, limit: total });
        return page.records;
    }

    private view(deviceId: string): DeviceView | undefined {
        const device = this.deps.registry.get(deviceId);
        if (!device) return undefined;

        return {
            ...device,
            online: this.deps.registry.isOnline(device),
            queueLength: this.deps.dispatcher.size(deviceId),
        };
    }
}
