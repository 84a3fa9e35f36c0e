import express, { Router } from 'express';
import { IclockService } from '../services/iclock.service';
import { createIclockController } from '../controllers/iclock.controller';

/**
 * Terminal-facing paths. eSSL firmware appends ".aspx", ZKTeco firmware does not.
 */
export function createIclockRouter(iclock: IclockService): Router {
    const router = Router();
    const iclockController = createIclockController(iclock);

    // Bodies are raw protocol text whatever content type the firmware claims
    router.use(express.text({ type: () => true, limit: '10mb' }));

    // Attendance pushes (POST) and liveness probes (GET)
    router.get(['/cdata', '/cdata.aspx'], iclockController.cdata);
    router.post(['/cdata', '/cdata.aspx'], iclockController.cdata);

    // One command per poll
    router.get(['/getrequest', '/getrequest.aspx'], iclockController.getRequest);

    // Registration
    router.get(['/registry', '/registry.aspx'], iclockController.registry);
    router.post(['/registry', '/registry.aspx'], iclockController.registry);

    // Command responses
    router.post(['/devicecmd', '/devicecmd.aspx'], iclockController.deviceCmd);

    return router;
}
