import config, { Config } from '../utils/config';
import { createGateway, Gateway } from '../gateway';
import { KeyedMutex } from '../utils/keyed-mutex';
import { IclockService, ProtocolRequest } from './iclock.service';

const testConfig: Config = {
    ...config,
    ingestion: { burstThreshold: 20 },
    commands: {
        defaultCommand: 'GET ATTLOG',
        fullFetch: 'GET ATTLOG ALL',
        incremental: 'GET ATTLOG',
        forceFetchRepeats: 3,
        maxQueueLength: 50,
    },
    identity: { headers: ['x-device-sn'] },
    storage: { ...config.storage, maxRecords: 0, maxLogEntries: 5000 },
};

function request(overrides: Partial<ProtocolRequest> = {}): ProtocolRequest {
    return {
        method: 'GET',
        path: '/iclock/cdata',
        query: {},
        body: '',
        headers: {},
        ip: '::ffff:10.0.0.5',
        ...overrides,
    };
}

describe('IclockService', () => {
    let now: number;
    let gateway: Gateway;

    beforeEach(() => {
        now = Date.UTC(2025, 0, 1, 9, 0, 5);
        gateway = createGateway(testConfig, { clock: () => now, inMemory: true });
    });

    describe('push', () => {
        it('stores an attendance line and registers the device from the body', async () => {
            const response = await gateway.iclock.handlePush(
                request({ method: 'POST', body: '42\t2025-01-01 09:00:00\t0\t1\t\nSN=ABC123' })
            );

            expect(response).toBe('OK');
            const page = await gateway.store.queryByFilter({ offset: 0, limit: 10 });
            expect(page.total).toBe(1);
            expect(page.records[0]).toMatchObject({ userId: '42', status: 'Check-in', deviceId: 'ABC123' });
            expect(gateway.registry.get('ABC123')).toMatchObject({
                ipAddress: '10.0.0.5',
                recordCount: 1,
                paramBag: { SN: 'ABC123' },
            });
        });

        it('answers OK to a liveness probe without a body', async () => {
            const response = await gateway.iclock.handlePush(request({ query: { SN: 'ABC123' } }));

            expect(response).toBe('OK');
            expect(gateway.registry.get('ABC123')?.commsCount).toBe(1);
            expect(await gateway.store.count()).toBe(0);
        });

        it('ignores retransmitted lines', async () => {
            const push = request({ method: 'POST', query: { SN: 'ABC123' }, body: '42\t2025-01-01 09:00:00\t0\t1' });

            await gateway.iclock.handlePush(push);
            await gateway.iclock.handlePush(push);

            expect(await gateway.store.count()).toBe(1);
        });

        it('tracks an unidentified device under its IP key', async () => {
            await gateway.iclock.handlePush(request({ method: 'POST', body: '42\t2025-01-01 09:00:00\t0' }));

            expect(gateway.registry.has('IP-10_0_0_5')).toBe(true);
            expect(await gateway.store.count({ deviceId: 'IP-10_0_0_5' })).toBe(1);
        });

        it('keeps IP-keyed and serial-keyed records of one terminal apart', async () => {
            await gateway.iclock.handlePush(request({ method: 'POST', body: '42\t2025-01-01 09:00:00\t0' }));
            await gateway.iclock.handlePush(request({ method: 'POST', query: { SN: 'ABC123' }, body: '42\t2025-01-01 09:00:00\t0' }));

            expect(gateway.registry.list().map((device) => device.deviceId).sort()).toEqual(['ABC123', 'IP-10_0_0_5']);
            expect(await gateway.store.count()).toBe(2);
        });

        it('re-queues the full fetch after a large burst of new records', async () => {
            const lines = Array.from({ length: 21 }, (_, i) => `${i + 1}\t2025-01-01 08:00:00\t0\t1`);

            await gateway.iclock.handlePush(request({ method: 'POST', query: { SN: 'ABC123' }, body: lines.join('\n') }));
            await gateway.iclock.handlePush(
                request({ method: 'POST', query: { SN: 'ABC123' }, body: lines.map((l) => l.replace('08:00', '08:30')).join('\n') })
            );

            expect(gateway.dispatcher.pending('ABC123').map((entry) => entry.command)).toEqual(['GET ATTLOG ALL']);
        });

        it('does not treat exactly the threshold as a burst', async () => {
            const lines = Array.from({ length: 20 }, (_, i) => `${i + 1}\t2025-01-01 08:00:00\t0\t1`);

            await gateway.iclock.handlePush(request({ method: 'POST', query: { SN: 'ABC123' }, body: lines.join('\n') }));

            expect(gateway.dispatcher.size('ABC123')).toBe(0);
        });

        it('does not record another terminal serial found in the body', async () => {
            await gateway.iclock.handlePush(
                request({ method: 'POST', query: { SN: 'ABC123' }, body: '42\t2025-01-01 09:00:00\t0\nSN=XYZ9' })
            );

            expect(gateway.registry.get('ABC123')?.paramBag).not.toHaveProperty('SN');
            expect(gateway.registry.has('XYZ9')).toBe(false);
            expect(await gateway.store.count({ deviceId: 'ABC123' })).toBe(1);
        });

        it('answers pushes and polls while a flush is still writing', async () => {
            let release: (saved: boolean) => void = () => undefined;
            const flush = jest.fn(
                () =>
                    new Promise<boolean>((resolve) => {
                        release = resolve;
                    })
            );
            const iclock = new IclockService({
                identity: gateway.identity,
                registry: gateway.registry,
                dispatcher: gateway.dispatcher,
                ingestion: gateway.ingestion,
                logSink: gateway.logs,
                mutex: new KeyedMutex(),
                burstThreshold: 20,
                persistence: { flush },
            });

            const first = await iclock.handlePush(
                request({ method: 'POST', query: { SN: 'ABC123' }, body: '42\t2025-01-01 09:00:00\t0' })
            );
            const second = await iclock.handlePush(
                request({ method: 'POST', query: { SN: 'XYZ9' }, body: '7\t2025-01-01 09:01:00\t0' })
            );
            const poll = await iclock.handlePoll(request({ path: '/iclock/getrequest', query: { SN: 'ABC123' } }));

            expect([first, second, poll]).toEqual(['OK', 'OK', 'GET ATTLOG']);
            expect(flush).toHaveBeenCalledTimes(2);
            release(true);
        });

        it('still answers OK when storage fails', async () => {
            jest.spyOn(gateway.store, 'insertIfAbsent').mockRejectedValue(new Error('disk full'));

            const response = await gateway.iclock.handlePush(
                request({ method: 'POST', query: { SN: 'ABC123' }, body: '42\t2025-01-01 09:00:00\t0' })
            );

            expect(response).toBe('OK');
            expect(gateway.logs.recent(1)[0]).toMatchObject({ level: 'error', message: 'Push handling failed: disk full' });
        });
    });

    describe('poll', () => {
        it('returns the default command and leaves an empty queue empty', async () => {
            const response = await gateway.iclock.handlePoll(request({ path: '/iclock/getrequest', query: { SN: 'ABC123' } }));

            expect(response).toBe('GET ATTLOG');
            expect(gateway.dispatcher.state('ABC123')).toBe('EMPTY');
        });

        it('hands out queued commands one at a time', async () => {
            await gateway.iclock.handlePoll(request({ query: { SN: 'ABC123' } }));
            gateway.control.enqueueCommand('ABC123', 'A');
            gateway.control.enqueueCommand('ABC123', 'B');
            gateway.control.enqueueCommand('ABC123', 'C');

            const responses: string[] = [];
            for (let i = 0; i < 4; i++) {
                responses.push(await gateway.iclock.handlePoll(request({ query: { SN: 'ABC123' } })));
            }

            expect(responses).toEqual(['A', 'B', 'C', 'GET ATTLOG']);
        });

        it('delivers the fetch-all opcode first after a forced full fetch', async () => {
            await gateway.iclock.handlePoll(request({ query: { SN: 'ABC123' } }));
            gateway.control.forceFullFetch('ABC123');
            const initial = gateway.dispatcher.size('ABC123');

            const first = await gateway.iclock.handlePoll(request({ query: { SN: 'ABC123' } }));
            expect(first).toBe('GET ATTLOG ALL');
            expect(gateway.dispatcher.size('ABC123')).toBe(initial - 1);

            await gateway.iclock.handlePoll(request({ query: { SN: 'ABC123' } }));
            expect(gateway.dispatcher.size('ABC123')).toBe(initial - 2);

            await gateway.iclock.handlePoll(request({ query: { SN: 'ABC123' } }));
            expect(gateway.dispatcher.size('ABC123')).toBe(initial - 3);
        });

        it('never hands the same entry to two concurrent polls', async () => {
            await gateway.iclock.handlePoll(request({ query: { SN: 'ABC123' } }));
            gateway.control.enqueueCommand('ABC123', 'INFO');

            const responses = await Promise.all([
                gateway.iclock.handlePoll(request({ query: { SN: 'ABC123' } })),
                gateway.iclock.handlePoll(request({ query: { SN: 'ABC123' } })),
            ]);

            expect(responses.sort()).toEqual(['GET ATTLOG', 'INFO']);
        });
    });

    describe('registration and command responses', () => {
        it('folds every registration query parameter into the device', async () => {
            const response = await gateway.iclock.handleRegistration(
                request({ path: '/iclock/registry', query: { SN: 'ABC123', DeviceType: 'att', PushVersion: '2.4.1' } })
            );

            expect(response).toBe('OK');
            expect(gateway.registry.get('ABC123')?.paramBag).toEqual({
                SN: 'ABC123',
                DeviceType: 'att',
                PushVersion: '2.4.1',
            });
        });

        it('folds command response lines into the device', async () => {
            const response = await gateway.iclock.handleCommandResponse(
                request({
                    method: 'POST',
                    path: '/iclock/devicecmd',
                    query: { SN: 'ABC123' },
                    body: 'ID=1&Return=0&CMD=INFO\n~DeviceName=Front Door\nUserCount=12',
                })
            );

            expect(response).toBe('OK');
            const device = gateway.registry.get('ABC123');
            expect(device?.paramBag).toEqual({
                ID: '1',
                Return: '0',
                CMD: 'INFO',
                '~DeviceName': 'Front Door',
                UserCount: '12',
            });
            expect(device?.displayName).toBe('Front Door');
        });
    });
});
