import cron, { ScheduledTask } from 'node-cron';
import { Flushable } from '../types';
import logger from '../utils/logger';
import { everySeconds } from './schedule';

/**
 * Start periodic persistence flush. Failures are logged by the flush itself
 * and retried on the next run.
 */
export function startPersistenceFlushJob(persistence: Flushable, intervalSeconds: number): ScheduledTask {
    const task = cron.schedule(everySeconds(intervalSeconds), () => {
        void persistence.flush();
    });
    logger.info(`Persistence flush scheduled (every ${intervalSeconds} seconds)`);
    return task;
}
