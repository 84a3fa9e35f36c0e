import { AttendanceEvent } from '../types';
import { MemoryRecordStore } from './record-store.service';

function event(overrides: Partial<AttendanceEvent> = {}): Omit<AttendanceEvent, 'id'> {
    return {
        deviceId: 'ABC123',
        userId: '42',
        timestamp: '2025-01-01T09:00:00',
        statusCode: '0',
        status: 'Check-in',
        receivedAt: '2025-01-01T09:00:05.000Z',
        rawLine: '42\t2025-01-01 09:00:00\t0',
        ...overrides,
    };
}

describe('MemoryRecordStore', () => {
    it('inserts a new event and assigns sequential ids', async () => {
        const store = new MemoryRecordStore();

        const first = await store.insertIfAbsent(event());
        const second = await store.insertIfAbsent(event({ userId: '43' }));

        expect(first.status).toBe('inserted');
        expect(second.status).toBe('inserted');
        if (first.status === 'inserted' && second.status === 'inserted') {
            expect(first.event.id).toBe(1);
            expect(second.event.id).toBe(2);
        }
        expect(await store.count()).toBe(2);
    });

    it('keeps the first write on duplicate identity keys', async () => {
        const store = new MemoryRecordStore();

        await store.insertIfAbsent(event({ verification: '1' }));
        const result = await store.insertIfAbsent(event({ verification: '15', rawLine: 'other' }));

        expect(result.status).toBe('duplicate');
        if (result.status === 'duplicate') {
            expect(result.existing.verification).toBe('1');
        }
        expect(await store.count()).toBe(1);
    });

    it('treats the same punch on different devices as distinct', async () => {
        const store = new MemoryRecordStore();

        await store.insertIfAbsent(event());
        const result = await store.insertIfAbsent(event({ deviceId: 'IP-10_0_0_5' }));

        expect(result.status).toBe('inserted');
        expect(await store.count()).toBe(2);
    });

    it('filters by device, user and inclusive date range', async () => {
        const store = new MemoryRecordStore();
        await store.insertIfAbsent(event({ timestamp: '2025-01-01T09:00:00' }));
        await store.insertIfAbsent(event({ timestamp: '2025-01-02T09:00:00' }));
        await store.insertIfAbsent(event({ timestamp: '2025-01-03T09:00:00' }));
        await store.insertIfAbsent(event({ userId: '7', timestamp: '2025-01-02T10:00:00' }));

        const page = await store.queryByFilter({
            userId: '42',
            from: '2025-01-02',
            to: '2025-01-03',
            offset: 0,
            limit: 10,
        });

        expect(page.total).toBe(2);
        expect(page.records.map((r) => r.timestamp)).toEqual([
            '2025-01-02T09:00:00',
            '2025-01-03T09:00:00',
        ]);
        expect(await store.count({ deviceId: 'ABC123', to: '2025-01-01' })).toBe(1);
    });

    it('accepts range bounds in the terminal format with a space separator', async () => {
        const store = new MemoryRecordStore();
        await store.insertIfAbsent(event({ timestamp: '2025-01-01T08:00:00' }));

        expect(await store.count({ to: '2025-01-01 09:00:00' })).toBe(1);
        expect(await store.count({ from: '2025-01-01 09:00:00' })).toBe(0);
        expect(await store.count({ from: '2025-01-01 07:59:59', to: '2025-01-01 08:00:00' })).toBe(1);
    });

    it('paginates results', async () => {
        const store = new MemoryRecordStore();
        for (let i = 0; i < 5; i++) {
            await store.insertIfAbsent(event({ userId: String(i) }));
        }

        const page = await store.queryByFilter({ offset: 2, limit: 2 });

        expect(page.total).toBe(5);
        expect(page.records.map((r) => r.userId)).toEqual(['2', '3']);
    });

    it('prunes the oldest events past the retention limit and forgets their keys', async () => {
        const store = new MemoryRecordStore(2);
        await store.insertIfAbsent(event({ userId: '1' }));
        await store.insertIfAbsent(event({ userId: '2' }));
        await store.insertIfAbsent(event({ userId: '3' }));

        expect((await store.all()).map((r) => r.userId)).toEqual(['2', '3']);
        expect((await store.insertIfAbsent(event({ userId: '1' }))).status).toBe('inserted');
    });

    it('restores saved events and continues the id sequence', async () => {
        const store = new MemoryRecordStore();
        store.restore([
            { ...event(), id: 4 },
            { ...event(), id: 9 },
            { ...event({ userId: '8' }), id: 7 },
        ]);

        expect(await store.count()).toBe(2);
        const result = await store.insertIfAbsent(event({ userId: '99' }));
        if (result.status === 'inserted') {
            expect(result.event.id).toBe(8);
        }
        expect(result.status).toBe('inserted');
    });
});
