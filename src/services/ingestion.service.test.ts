import { LogSinkService } from './log-sink.service';
import { DeviceRegistryService } from './device-registry.service';
import { MemoryRecordStore } from './record-store.service';
import { IngestionService } from './ingestion.service';

describe('IngestionService', () => {
    const now = Date.UTC(2025, 0, 1, 9, 0, 5);
    let store: MemoryRecordStore;
    let registry: DeviceRegistryService;
    let logSink: LogSinkService;
    let ingestion: IngestionService;

    beforeEach(() => {
        logSink = new LogSinkService(1000, () => now);
        store = new MemoryRecordStore();
        registry = new DeviceRegistryService(logSink, 120_000, () => now);
        ingestion = new IngestionService(store, registry, logSink, () => now);
        registry.touch('ABC123', '10.0.0.5');
    });

    it('stores an accepted line with device and receipt time', async () => {
        const summary = await ingestion.ingestBody('42\t2025-01-01 09:00:00\t0\t1\t', 'ABC123');

        expect(summary.accepted).toBe(1);
        expect(summary.events[0]).toEqual({
            id: 1,
            deviceId: 'ABC123',
            userId: '42',
            timestamp: '2025-01-01T09:00:00',
            statusCode: '0',
            status: 'Check-in',
            verification: '1',
            receivedAt: '2025-01-01T09:00:05.000Z',
            rawLine: '42\t2025-01-01 09:00:00\t0\t1\t',
        });
        expect(registry.get('ABC123')?.recordCount).toBe(1);
    });

    it('stores the same raw line only once', async () => {
        const line = '42\t2025-01-01 09:00:00\t0\t1\t';

        await ingestion.ingestBody(line, 'ABC123');
        const second = await ingestion.ingestBody(line, 'ABC123');

        expect(second).toMatchObject({ accepted: 0, duplicates: 1 });
        expect(await store.count()).toBe(1);
        expect(registry.get('ABC123')?.recordCount).toBe(1);
    });

    it('processes a mixed batch in line order and skips garbage', async () => {
        const body = [
            'SN=ABC123',
            '1\t2025-01-01 08:00:00\t0\t1',
            'not an attendance line',
            '2\t2025-01-01 08:01:00\t1\t1',
            '1\t2025-01-01 08:00:00\t0\t15',
        ].join('\n');

        const summary = await ingestion.ingestBody(body, 'ABC123');

        expect(summary).toMatchObject({ accepted: 2, duplicates: 1, identities: 1, unrecognized: 1 });
        expect(summary.events.map((event) => event.userId)).toEqual(['1', '2']);
        expect(logSink.recent(1000).some((entry) => entry.message === 'Skipped unrecognized line: not an attendance line')).toBe(true);
    });

    it('admits concurrent retransmissions only once', async () => {
        const line = '42\t2025-01-01 09:00:00\t0';

        const results = await Promise.all([
            ingestion.ingestBody(line, 'ABC123'),
            ingestion.ingestBody(line, 'ABC123'),
        ]);

        expect(results.map((r) => r.accepted).sort()).toEqual([0, 1]);
        expect(await store.count()).toBe(1);
    });
});
