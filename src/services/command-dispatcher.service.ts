import { Clock, CommandQueueEntry, LogSink, QueueState } from '../types';

export const FORCE_FETCH_ALL = 'FORCE_FETCH_ALL';

export const IDENTITY_QUERY = 'INFO';
export const OPTION_QUERY = 'GET OPTION';
export const ENABLE_PUSH = 'SET OPTION RTLOG=1';

export interface DispatcherOptions {
    defaultCommand: string;
    fullFetchCommand: string;
    forceFetchRepeats: number;
    maxQueueLength: number;
}

/**
 * Per-device FIFO of outbound opcodes. Terminals cannot be addressed directly,
 * so each poll drains exactly one entry; delivery is at-most-once.
 */
export class CommandDispatcherService {
    private queues = new Map<string, CommandQueueEntry[]>();

    constructor(
        private readonly options: DispatcherOptions,
        private readonly logSink: LogSink,
        private readonly clock: Clock = Date.now
    ) {}

    get defaultCommand(): string {
        return this.options.defaultCommand;
    }

    get fullFetchCommand(): string {
        return this.options.fullFetchCommand;
    }

    /**
     * Sequence queued by FORCE_FETCH_ALL. The fetch-all opcode goes out on the
     * very next poll and is repeated a bounded number of times.
     */
    get forceFetchSequence(): string[] {
        const { fullFetchCommand, forceFetchRepeats } = this.options;
        return [
            fullFetchCommand,
            IDENTITY_QUERY,
            OPTION_QUERY,
            ENABLE_PUSH,
            ...Array<string>(Math.max(forceFetchRepeats - 1, 0)).fill(fullFetchCommand),
        ];
    }

    /**
     * Append a command; returns false when the queue is full
     */
    enqueue(deviceId: string, command: string): boolean {
        const opcode = command.trim();
        if (opcode.toUpperCase() === FORCE_FETCH_ALL) {
            this.forceFetchAll(deviceId);
            return true;
        }

        const queue = this.queueFor(deviceId);
        if (queue.length >= this.options.maxQueueLength) {
            this.logSink.append('warn', `Command queue full, dropped: ${opcode}`, deviceId);
            return false;
        }

        queue.push({ command: opcode, enqueuedAt: this.clock() });
        return true;
    }

    enqueueMany(deviceId: string, commands: string[]): number {
        return commands.filter((command) => this.enqueue(deviceId, command)).length;
    }

    /**
     * Enqueue unless the same opcode is already waiting
     */
    enqueueUnlessPending(deviceId: string, command: string): boolean {
        if (this.has(deviceId, command)) {
            return false;
        }
        return this.enqueue(deviceId, command);
    }

    /**
     * Take the next command for a device, or the default when nothing is queued
     */
    poll(deviceId: string): string {
        const queue = this.queues.get(deviceId);
        const entry = queue?.shift();
        if (!entry) {
            return this.options.defaultCommand;
        }

        if (queue && queue.length === 0) {
            this.queues.delete(deviceId);
        }
        return entry.command;
    }

    /**
     * Drop every undelivered command for a device
     */
    clear(deviceId: string): number {
        const removed = this.size(deviceId);
        this.queues.delete(deviceId);
        return removed;
    }

    forceFetchAll(deviceId: string): void {
        const cleared = this.clear(deviceId);
        const now = this.clock();
        this.queues.set(
            deviceId,
            this.forceFetchSequence.map((command) => ({ command, enqueuedAt: now }))
        );
        this.logSink.append('info', `Force fetch all queued (${cleared} pending commands replaced)`, deviceId);
    }

    pending(deviceId: string): CommandQueueEntry[] {
        return (this.queues.get(deviceId) ?? []).map((entry) => ({ ...entry }));
    }

    size(deviceId: string): number {
        return this.queues.get(deviceId)?.length ?? 0;
    }

    state(deviceId: string): QueueState {
        return this.size(deviceId) > 0 ? 'HAS_PENDING' : 'EMPTY';
    }

    has(deviceId: string, command: string): boolean {
        const opcode = command.trim();
        return (this.queues.get(deviceId) ?? []).some((entry) => entry.command === opcode);
    }

    private queueFor(deviceId: string): CommandQueueEntry[] {
        let queue = this.queues.get(deviceId);
        if (!queue) {
            queue = [];
            this.queues.set(deviceId, queue);
        }
        return queue;
    }
}
