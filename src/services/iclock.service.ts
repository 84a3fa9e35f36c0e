import { Flushable, LogSink } from '../types';
import { KeyedMutex } from '../utils/keyed-mutex';
import { errorMessage } from '../utils/errors';
import { IDENTITY_KEYS, parseKeyValueLines } from '../utils/line-parser';
import { IdentityRequest, IdentityService, normalizeIp, ResolvedIdentity } from './identity.service';
import { DeviceRegistryService } from './device-registry.service';
import { CommandDispatcherService } from './command-dispatcher.service';
import { IngestionService } from './ingestion.service';

export const ACK = 'OK';

export interface ProtocolRequest extends IdentityRequest {
    method: string;
    path: string;
}

export interface IclockServiceDeps {
    identity: IdentityService;
    registry: DeviceRegistryService;
    dispatcher: CommandDispatcherService;
    ingestion: IngestionService;
    logSink: LogSink;
    mutex: KeyedMutex;
    burstThreshold: number;
    persistence?: Flushable;
}

const BODY_PREVIEW = 500;

/**
 * Drop serial-number facts naming a terminal other than the resolved device
 */
function withoutForeignSerials(facts: Record<string, string>, deviceId: string): Record<string, string> {
    return Object.fromEntries(
        Object.entries(facts).filter(([key, value]) => !IDENTITY_KEYS.includes(key.toUpperCase()) || value.trim() === deviceId)
    );
}

/**
 * Terminal-facing side of the gateway. Every handler answers with the only
 * replies the firmware understands ("OK" or a single opcode), whatever
 * happens internally.
 */
export class IclockService {
    constructor(private readonly deps: IclockServiceDeps) {}

    /**
     * Attendance push (POST) or liveness probe (GET) on the push path
     */
    async handlePush(request: ProtocolRequest): Promise<string> {
        try {
            const identity = this.deps.identity.resolve(request);

            const accepted = await this.deps.mutex.runExclusive(identity.deviceId, async () => {
                this.contact(request, identity);
                if (request.method.toUpperCase() !== 'POST') {
                    return 0;
                }

                const summary = await this.deps.ingestion.ingestBody(request.body, identity.deviceId);
                if (summary.accepted > 0) {
                    const total = this.deps.registry.get(identity.deviceId)?.recordCount ?? summary.accepted;
                    this.deps.logSink.append(
                        'info',
                        `Added ${summary.accepted} new records (${summary.duplicates} duplicates, total ${total})`,
                        identity.deviceId
                    );
                }

                if (summary.accepted > this.deps.burstThreshold) {
                    const { dispatcher } = this.deps;
                    if (dispatcher.enqueueUnlessPending(identity.deviceId, dispatcher.fullFetchCommand)) {
                        this.deps.logSink.append('info', `Burst of ${summary.accepted} records, re-queued ${dispatcher.fullFetchCommand}`, identity.deviceId);
                    }
                }

                return summary.accepted;
            });

            // Flushes are shared by all devices; the reply does not wait for the disk
            if (accepted > 0 && this.deps.persistence) {
                void this.deps.persistence.flush();
            }
            return ACK;
        } catch (error) {
            this.deps.logSink.append('error', `Push handling failed: ${errorMessage(error)}`);
            return ACK;
        }
    }

    /**
     * Command poll: exactly one opcode per request
     */
    async handlePoll(request: ProtocolRequest): Promise<string> {
        const { dispatcher } = this.deps;

        try {
            const identity = this.deps.identity.resolve(request);

            return await this.deps.mutex.runExclusive(identity.deviceId, () => {
                this.contact(request, identity);

                const queued = dispatcher.size(identity.deviceId) > 0;
                const command = dispatcher.poll(identity.deviceId);
                if (queued) {
                    this.deps.logSink.append('info', `Sending command: ${command}`, identity.deviceId);
                } else {
                    this.deps.logSink.append('debug', `No commands queued, default: ${command}`, identity.deviceId);
                }
                return command;
            });
        } catch (error) {
            this.deps.logSink.append('error', `Poll handling failed: ${errorMessage(error)}`);
            return dispatcher.defaultCommand;
        }
    }

    /**
     * Registration: every query parameter is kept as a device parameter
     */
    async handleRegistration(request: ProtocolRequest): Promise<string> {
        try {
            const identity = this.deps.identity.resolve(request);

            return await this.deps.mutex.runExclusive(identity.deviceId, () => {
                this.contact(request, identity, request.query);
                this.deps.logSink.append('info', `Registered with ${Object.keys(request.query).length} parameters`, identity.deviceId);
                return ACK;
            });
        } catch (error) {
            this.deps.logSink.append('error', `Registration handling failed: ${errorMessage(error)}`);
            return ACK;
        }
    }

    /**
     * Command response: KEY=VALUE lines describing device configuration
     */
    async handleCommandResponse(request: ProtocolRequest): Promise<string> {
        try {
            const identity = this.deps.identity.resolve(request);
            const facts = parseKeyValueLines(request.body);

            return await this.deps.mutex.runExclusive(identity.deviceId, () => {
                this.contact(request, identity, facts);
                for (const [key, value] of Object.entries(facts)) {
                    this.deps.logSink.append('debug', `Device info: ${key} = ${value}`, identity.deviceId);
                }
                return ACK;
            });
        } catch (error) {
            this.deps.logSink.append('error', `Command response handling failed: ${errorMessage(error)}`);
            return ACK;
        }
    }

    private contact(request: ProtocolRequest, identity: ResolvedIdentity, extraFacts: Record<string, string> = {}): void {
        const ip = normalizeIp(request.ip);
        this.deps.registry.touch(identity.deviceId, ip, withoutForeignSerials({ ...identity.facts, ...extraFacts }, identity.deviceId));

        const body = request.body.length > BODY_PREVIEW ? `${request.body.slice(0, BODY_PREVIEW)}...` : request.body;
        this.deps.logSink.append(
            'debug',
            `${request.method} ${request.path} from ${ip || 'unknown'} (identity via ${identity.source})${body ? `: ${body}` : ''}`,
            identity.deviceId
        );
    }
}
