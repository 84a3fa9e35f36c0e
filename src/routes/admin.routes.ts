import express, { Router } from 'express';
import { ControlService } from '../services/control.service';
import { createAdminController } from '../controllers/admin.controller';

export function createAdminRouter(control: ControlService): Router {
    const router = Router();
    const adminController = createAdminController(control);

    router.use(express.json());

    // Devices and their command queues
    router.get('/devices', adminController.listDevices);
    router.get('/devices/:deviceId', adminController.getDevice);
    router.post('/devices/:deviceId/commands', adminController.enqueueCommand);
    router.delete('/devices/:deviceId/commands', adminController.clearQueue);
    router.post('/devices/:deviceId/force-fetch', adminController.forceFullFetch);

    // Every known device
    router.post('/commands/broadcast', adminController.broadcastCommand);
    router.post('/force-fetch', adminController.forceFullFetch);

    // Attendance
    router.get('/records', adminController.listRecords);
    router.get('/export', adminController.exportRecords);
    router.get('/stats', adminController.stats);

    // Device activity log
    router.get('/logs', adminController.recentLogs);

    return router;
}
