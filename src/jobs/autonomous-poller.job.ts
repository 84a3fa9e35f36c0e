import cron, { ScheduledTask } from 'node-cron';
import { Clock, Device, FetchCampaign, LogSink } from '../types';
import { CommandDispatcherService, ENABLE_PUSH, IDENTITY_QUERY, OPTION_QUERY } from '../services/command-dispatcher.service';
import { DeviceRegistryService } from '../services/device-registry.service';
import logger from '../utils/logger';
import { errorMessage } from '../utils/errors';
import { everySeconds } from './schedule';

export interface PollerOptions {
    activeWindowMs: number;
    campaignMaxAttempts: number;
    campaignGraceMs: number;
    incrementalCommand: string;
}

/**
 * Keeps terminals busy. Only mutates queue state; the device collects the
 * work on its own next poll.
 */
export class AutonomousPoller {
    private primed = new Set<string>();
    private campaigns = new Map<string, FetchCampaign>();

    constructor(
        private readonly registry: DeviceRegistryService,
        private readonly dispatcher: CommandDispatcherService,
        private readonly logSink: LogSink,
        private readonly options: PollerOptions,
        private readonly clock: Clock = Date.now
    ) {}

    get initSequence(): string[] {
        return [IDENTITY_QUERY, OPTION_QUERY, ENABLE_PUSH, this.dispatcher.fullFetchCommand];
    }

    tick(): void {
        const now = this.clock();

        for (const device of this.registry.list()) {
            if (now - device.lastSeenAt >= this.options.activeWindowMs) {
                // Initialization re-arms when the device comes back
                this.primed.delete(device.deviceId);
                if (this.campaigns.delete(device.deviceId)) {
                    this.logSink.append('info', 'Full fetch abandoned, device inactive', device.deviceId);
                }
                continue;
            }

            this.advanceCampaign(device, now);

            const queueEmpty = this.dispatcher.size(device.deviceId) === 0;
            if (!this.primed.has(device.deviceId)) {
                if (queueEmpty) {
                    this.initialize(device);
                }
                continue;
            }

            if (queueEmpty && !this.campaigns.has(device.deviceId)) {
                this.dispatcher.enqueue(device.deviceId, this.options.incrementalCommand);
                this.logSink.append('debug', `Auto-queued ${this.options.incrementalCommand}`, device.deviceId);
            }
        }
    }

    /**
     * Begin (or restart) a bounded full-fetch campaign. The request already
     * queued counts as the first attempt.
     */
    startCampaign(deviceId: string): FetchCampaign {
        const now = this.clock();
        const campaign: FetchCampaign = {
            deviceId,
            startedAt: now,
            attempts: 1,
            lastAttemptAt: now,
            lastRecordCount: this.registry.get(deviceId)?.recordCount ?? 0,
            lastProgressAt: null,
        };
        this.campaigns.set(deviceId, campaign);
        this.primed.add(deviceId);
        return { ...campaign };
    }

    campaign(deviceId: string): FetchCampaign | undefined {
        const campaign = this.campaigns.get(deviceId);
        return campaign ? { ...campaign } : undefined;
    }

    private initialize(device: Device): void {
        this.dispatcher.enqueueMany(device.deviceId, this.initSequence);
        this.startCampaign(device.deviceId);
        this.logSink.append('info', `Initialization sequence queued: ${this.initSequence.join(', ')}`, device.deviceId);
    }

    private advanceCampaign(device: Device, now: number): void {
        const campaign = this.campaigns.get(device.deviceId);
        if (!campaign) return;

        if (device.recordCount > campaign.lastRecordCount) {
            campaign.lastRecordCount = device.recordCount;
            campaign.lastProgressAt = now;
            return;
        }

        const { campaignGraceMs, campaignMaxAttempts } = this.options;

        if (campaign.lastProgressAt !== null) {
            if (now - campaign.lastProgressAt >= campaignGraceMs) {
                this.campaigns.delete(device.deviceId);
                this.logSink.append('info', `Full fetch complete after ${campaign.attempts} attempt(s), ${device.recordCount} records held`, device.deviceId);
            }
            return;
        }

        const fullFetch = this.dispatcher.fullFetchCommand;
        if (now - campaign.lastAttemptAt < campaignGraceMs || this.dispatcher.has(device.deviceId, fullFetch)) {
            return;
        }

        if (campaign.attempts >= campaignMaxAttempts) {
            this.campaigns.delete(device.deviceId);
            this.logSink.append('warn', `Full fetch gave up after ${campaign.attempts} attempts with no records`, device.deviceId);
            return;
        }

        if (this.dispatcher.enqueue(device.deviceId, fullFetch)) {
            campaign.attempts++;
            campaign.lastAttemptAt = now;
            this.logSink.append('info', `Re-queued ${fullFetch} (attempt ${campaign.attempts}/${campaignMaxAttempts})`, device.deviceId);
        }
    }
}

/**
 * Start autonomous poller cron job
 */
export function startAutonomousPollerJob(poller: AutonomousPoller, intervalSeconds: number): ScheduledTask {
    const task = cron.schedule(everySeconds(intervalSeconds), () => {
        try {
            poller.tick();
        } catch (error) {
            logger.error('[CRON] Autonomous poller tick failed', { error: errorMessage(error) });
        }
    });
    logger.info(`Autonomous poller scheduled (every ${intervalSeconds} seconds)`);
    return task;
}
