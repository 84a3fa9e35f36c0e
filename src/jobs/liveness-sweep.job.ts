import cron, { ScheduledTask } from 'node-cron';
import { DeviceRegistryService } from '../services/device-registry.service';
import logger from '../utils/logger';
import { errorMessage } from '../utils/errors';
import { everySeconds } from './schedule';

/**
 * Start liveness sweep cron job
 */
export function startLivenessSweepJob(registry: DeviceRegistryService, intervalSeconds: number): ScheduledTask {
    const task = cron.schedule(everySeconds(intervalSeconds), () => {
        try {
            const lost = registry.sweepLiveness();
            if (lost.length > 0) {
                logger.info(`[CRON] ${lost.length} device(s) went offline`);
            }
        } catch (error) {
            logger.error('[CRON] Liveness sweep failed', { error: errorMessage(error) });
        }
    });
    logger.info(`Liveness sweep scheduled (every ${intervalSeconds} seconds)`);
    return task;
}
