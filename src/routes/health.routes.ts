import { Router } from 'express';
import { Gateway } from '../gateway';
import { createHealthController } from '../controllers/health.controller';

export function createHealthRouter(gateway: Gateway): Router {
    const router = Router();
    const healthController = createHealthController(gateway);

    // Overall health check
    router.get('/', healthController.getHealth);

    return router;
}
