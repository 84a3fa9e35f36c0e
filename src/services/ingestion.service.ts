import { AttendanceCandidate, AttendanceEvent, Clock, LogSink, RecordStore } from '../types';
import { parseLine, splitLines } from '../utils/line-parser';
import { DeviceRegistryService } from './device-registry.service';

export type IngestOutcome =
    | { status: 'accepted'; event: AttendanceEvent }
    | { status: 'duplicate'; existing: AttendanceEvent };

export interface IngestSummary {
    accepted: number;
    duplicates: number;
    identities: number;
    unrecognized: number;
    events: AttendanceEvent[];
}

/**
 * Turns parsed attendance lines into stored events, discarding retransmissions.
 */
export class IngestionService {
    constructor(
        private readonly store: RecordStore,
        private readonly registry: DeviceRegistryService,
        private readonly logSink: LogSink,
        private readonly clock: Clock = Date.now
    ) {}

    async ingest(candidate: AttendanceCandidate, deviceId: string): Promise<IngestOutcome> {
        const result = await this.store.insertIfAbsent({
            ...candidate,
            deviceId,
            receivedAt: new Date(this.clock()).toISOString(),
        });

        if (result.status === 'duplicate') {
            this.logSink.append('debug', `Duplicate attendance skipped: user ${candidate.userId} at ${candidate.timestamp}`, deviceId);
            return result;
        }

        this.registry.recordAccepted(deviceId);
        this.logSink.append(
            'info',
            `New attendance: user ${candidate.userId} at ${candidate.timestamp} (${candidate.status})`,
            deviceId
        );
        return { status: 'accepted', event: result.event };
    }

    /**
     * Ingest every line of a push body, in order. Callers serialize bodies per device.
     */
    async ingestBody(body: string, deviceId: string): Promise<IngestSummary> {
        const summary: IngestSummary = {
            accepted: 0,
            duplicates: 0,
            identities: 0,
            unrecognized: 0,
            events: [],
        };

        for (const line of splitLines(body)) {
            const parsed = parseLine(line);

            if (parsed.kind === 'identity') {
                summary.identities++;
                continue;
            }

            if (parsed.kind === 'unrecognized') {
                summary.unrecognized++;
                this.logSink.append('debug', `Skipped unrecognized line: ${parsed.line.slice(0, 200)}`, deviceId);
                continue;
            }

            const outcome = await this.ingest(parsed.candidate, deviceId);
            if (outcome.status === 'accepted') {
                summary.accepted++;
                summary.events.push(outcome.event);
            } else {
                summary.duplicates++;
            }
        }

        return summary;
    }
}
