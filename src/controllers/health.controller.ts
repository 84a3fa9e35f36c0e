import { Request, Response } from 'express';
import { Gateway } from '../gateway';
import logger from '../utils/logger';
import { errorMessage } from '../utils/errors';

export function createHealthController(gateway: Gateway) {
    /**
     * Overall health check
     */
    async function getHealth(req: Request, res: Response): Promise<void> {
        try {
            const devices = gateway.registry.list();
            res.json({
                status: 'healthy',
                timestamp: new Date().toISOString(),
                uptime: process.uptime(),
                devices: {
                    known: devices.length,
                    online: devices.filter((device) => gateway.registry.isOnline(device)).length,
                },
                records: await gateway.store.count(),
                persistence: gateway.persistence ? 'file' : 'memory',
            });
        } catch (error) {
            logger.error('Health check failed', { error: errorMessage(error) });
            res.status(500).json({
                status: 'unhealthy',
                error: errorMessage(error),
            });
        }
    }

    return { getHealth };
}
