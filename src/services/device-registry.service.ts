import { Clock, Device, LogSink } from '../types';

const DISPLAY_NAME_KEYS = ['devicename', '~devicename'];

function copyDevice(device: Device): Device {
    return { ...device, paramBag: { ...device.paramBag } };
}

export interface LivenessTransition {
    deviceId: string;
    lastSeenAt: number;
}

/**
 * Owner of every known terminal. Devices are created on first contact and never removed.
 */
export class DeviceRegistryService {
    private devices = new Map<string, Device>();
    private revisionCounter = 0;

    constructor(
        private readonly logSink: LogSink,
        private readonly thresholdMs: number,
        private readonly clock: Clock = Date.now
    ) {}

    /**
     * Record contact from a device, creating it if unseen
     */
    touch(deviceId: string, ip: string | null, facts: Record<string, string> = {}): Device {
        const now = this.clock();
        let device = this.devices.get(deviceId);

        if (!device) {
            device = {
                deviceId,
                firstSeenAt: now,
                lastSeenAt: now,
                ipAddress: null,
                displayName: deviceId,
                paramBag: {},
                recordCount: 0,
                commsCount: 0,
                connected: true,
            };
            this.devices.set(deviceId, device);
            this.logSink.append('info', `New device registered: ${deviceId} (${ip || 'unknown IP'})`, deviceId);
        } else if (!device.connected) {
            device.connected = true;
            this.logSink.append('info', `Device reconnected: ${deviceId}`, deviceId);
        }

        device.lastSeenAt = now;
        device.commsCount++;
        if (ip) {
            device.ipAddress = ip;
        }

        for (const [key, value] of Object.entries(facts)) {
            device.paramBag[key] = value;
            if (DISPLAY_NAME_KEYS.includes(key.toLowerCase()) && value) {
                device.displayName = value;
            }
        }

        this.revisionCounter++;
        return copyDevice(device);
    }

    get(deviceId: string): Device | undefined {
        const device = this.devices.get(deviceId);
        return device ? copyDevice(device) : undefined;
    }

    has(deviceId: string): boolean {
        return this.devices.has(deviceId);
    }

    list(): Device[] {
        return [...this.devices.values()].map(copyDevice);
    }

    isOnline(device: Pick<Device, 'lastSeenAt'>, now = this.clock()): boolean {
        return now - device.lastSeenAt < this.thresholdMs;
    }

    /**
     * Count newly stored attendance records against a device
     */
    recordAccepted(deviceId: string, count = 1): void {
        const device = this.devices.get(deviceId);
        if (!device || count <= 0) return;

        device.recordCount += count;
        this.revisionCounter++;
    }

    /**
     * Mark devices that went quiet as disconnected. Each online-to-offline edge
     * is reported once; a device stays silent here until it reconnects.
     */
    sweepLiveness(): LivenessTransition[] {
        const now = this.clock();
        const transitions: LivenessTransition[] = [];

        for (const device of this.devices.values()) {
            if (device.connected && !this.isOnline(device, now)) {
                device.connected = false;
                transitions.push({ deviceId: device.deviceId, lastSeenAt: device.lastSeenAt });
                const silentFor = Math.round((now - device.lastSeenAt) / 1000);
                this.logSink.append('warn', `Device connection lost: ${device.deviceId} (silent ${silentFor}s)`, device.deviceId);
            }
        }

        if (transitions.length > 0) {
            this.revisionCounter++;
        }
        return transitions;
    }

    get size(): number {
        return this.devices.size;
    }

    get revision(): number {
        return this.revisionCounter;
    }

    snapshot(): Device[] {
        return this.list();
    }

    /**
     * Load saved devices. Liveness is unknown until they call in again.
     */
    restore(devices: Device[]): void {
        this.devices.clear();
        for (const device of devices) {
            this.devices.set(device.deviceId, { ...copyDevice(device), connected: false });
        }
    }
}
