import { Request, Response } from 'express';
import { ControlService, ExportFormat } from '../services/control.service';
import logger from '../utils/logger';
import { errorMessage } from '../utils/errors';

const MAX_PAGE_SIZE = 1000;

function queryString(req: Request, key: string): string | undefined {
    const value = req.query[key];
    return typeof value === 'string' && value.trim() ? value.trim() : undefined;
}

function queryInt(req: Request, key: string, defaultValue: number): number {
    const value = parseInt(queryString(req, key) ?? '', 10);
    return isNaN(value) ? defaultValue : value;
}

function bodyCommand(req: Request): string | undefined {
    const body: unknown = req.body;
    if (typeof body === 'object' && body !== null && 'command' in body && typeof body.command === 'string') {
        return body.command.trim() || undefined;
    }
    return undefined;
}

function fail(res: Response, context: string, error: unknown): void {
    logger.error(context, { error: errorMessage(error) });
    res.status(500).json({
        success: false,
        error: errorMessage(error),
    });
}

/**
 * Operator endpoints over the control service
 */
export function createAdminController(control: ControlService) {
    /**
     * List known devices with liveness and queue length
     */
    async function listDevices(req: Request, res: Response): Promise<void> {
        res.json({ success: true, devices: control.listDevices() });
    }

    async function getDevice(req: Request, res: Response): Promise<void> {
        const device = control.getDevice(req.params.deviceId);
        if (!device) {
            res.status(404).json({ success: false, error: 'Device not found' });
            return;
        }

        res.json({ success: true, device, pending: control.pendingCommands(device.deviceId) });
    }

    /**
     * Queue one opcode for a device
     */
    async function enqueueCommand(req: Request, res: Response): Promise<void> {
        const command = bodyCommand(req);
        if (!command) {
            res.status(400).json({ success: false, error: 'command is required' });
            return;
        }

        const result = control.enqueueCommand(req.params.deviceId, command);
        switch (result.status) {
            case 'unknown-device':
                res.status(404).json({ success: false, error: 'Device not found' });
                return;
            case 'queue-full':
                res.status(409).json({ success: false, error: 'Command queue is full', queueLength: result.queueLength });
                return;
            case 'queued':
                res.json({ success: true, queueLength: result.queueLength });
                return;
        }
    }

    async function clearQueue(req: Request, res: Response): Promise<void> {
        const removed = control.clearQueue(req.params.deviceId);
        res.json({ success: true, removed });
    }

    /**
     * Queue one opcode for every known device
     */
    async function broadcastCommand(req: Request, res: Response): Promise<void> {
        const command = bodyCommand(req);
        if (!command) {
            res.status(400).json({ success: false, error: 'command is required' });
            return;
        }

        const devices = control.broadcastCommand(command);
        res.json({ success: true, devices });
    }

    async function forceFullFetch(req: Request, res: Response): Promise<void> {
        const deviceId = req.params.deviceId;
        const devices = control.forceFullFetch(deviceId);
        if (deviceId && devices.length === 0) {
            res.status(404).json({ success: false, error: 'Device not found' });
            return;
        }

        res.json({ success: true, message: 'Force fetch initiated', devices });
    }

    /**
     * Paginated attendance records with optional filters
     */
    async function listRecords(req: Request, res: Response): Promise<void> {
        try {
            const limit = Math.min(Math.max(queryInt(req, 'limit', 100), 1), MAX_PAGE_SIZE);
            const page = Math.max(queryInt(req, 'page', 1), 1);

            const result = await control.queryRecords({
                deviceId: queryString(req, 'deviceId'),
                userId: queryString(req, 'userId'),
                from: queryString(req, 'from'),
                to: queryString(req, 'to'),
                offset: (page - 1) * limit,
                limit,
            });

            res.json({ success: true, page, limit, ...result });
        } catch (error) {
            fail(res, 'Failed to query records', error);
        }
    }

    async function exportRecords(req: Request, res: Response): Promise<void> {
        const format = queryString(req, 'format') ?? 'csv';
        if (format !== 'csv' && format !== 'json') {
            res.status(400).json({ success: false, error: 'format must be csv or json' });
            return;
        }

        try {
            const file = await control.exportRecords(format satisfies ExportFormat);
            res.setHeader('Content-Disposition', `attachment; filename=${file.filename}`);
            res.type(file.contentType).send(file.body);
        } catch (error) {
            fail(res, 'Failed to export records', error);
        }
    }

    async function stats(req: Request, res: Response): Promise<void> {
        try {
            res.json({ success: true, ...(await control.stats()) });
        } catch (error) {
            fail(res, 'Failed to compute stats', error);
        }
    }

    async function recentLogs(req: Request, res: Response): Promise<void> {
        const limit = Math.min(Math.max(queryInt(req, 'limit', 100), 1), MAX_PAGE_SIZE);
        res.json({ success: true, logs: control.recentLogs(limit, queryString(req, 'deviceId')) });
    }

    return {
        listDevices,
        getDevice,
        enqueueCommand,
        clearQueue,
        broadcastCommand,
        forceFullFetch,
        listRecords,
        exportRecords,
        stats,
        recentLogs,
    };
}
