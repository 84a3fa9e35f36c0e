import express, { Request, Response, NextFunction } from 'express';
import { ScheduledTask } from 'node-cron';
import config from './utils/config';
import logger from './utils/logger';
import { errorMessage } from './utils/errors';
import { createGateway } from './gateway';
import { createIclockRouter } from './routes/iclock.routes';
import { createAdminRouter } from './routes/admin.routes';
import { createHealthRouter } from './routes/health.routes';
import { startAutonomousPollerJob } from './jobs/autonomous-poller.job';
import { startLivenessSweepJob } from './jobs/liveness-sweep.job';
import { startPersistenceFlushJob } from './jobs/persistence-flush.job';

const gateway = createGateway(config);
const app = express();

app.set('trust proxy', config.trustProxy);
app.set('query parser', 'simple');

// Request logging
app.use((req: Request, res: Response, next: NextFunction) => {
    logger.debug(`${req.method} ${req.path}`, {
        ip: req.ip,
        userAgent: req.get('user-agent'),
    });
    next();
});

// Routes
app.use('/iclock', createIclockRouter(gateway.iclock));
app.use('/api', createAdminRouter(gateway.control));
app.use('/health', createHealthRouter(gateway));

// Root endpoint
app.get('/', (req: Request, res: Response) => {
    res.json({
        name: 'iClock Push Gateway',
        version: '1.0.0',
        status: 'running',
        endpoints: {
            health: '/health',
            iclock: '/iclock',
            api: '/api',
        },
    });
});

// Error handling middleware
app.use((err: Error, req: Request, res: Response, next: NextFunction) => {
    logger.error('Unhandled error', {
        error: err.message,
        stack: err.stack,
        path: req.path,
    });

    // Terminals only understand a plain acknowledgement
    if (req.path.startsWith('/iclock')) {
        res.type('text/plain').send('OK');
        return;
    }

    res.status(500).json({
        success: false,
        error: 'Internal server error',
        message: config.nodeEnv === 'development' ? err.message : undefined,
    });
});

// 404 handler
app.use((req: Request, res: Response) => {
    res.status(404).json({
        success: false,
        error: 'Not found',
    });
});

const tasks: ScheduledTask[] = [];

async function start(): Promise<void> {
    if (gateway.persistence) {
        await gateway.persistence.load();
    }

    const PORT = config.port;

    app.listen(PORT, () => {
        logger.info(`iClock Push Gateway started on port ${PORT}`, {
            nodeEnv: config.nodeEnv,
            dataDir: config.storage.dir,
        });
        gateway.logs.append('info', 'Gateway started');

        // Start cron jobs
        tasks.push(startAutonomousPollerJob(gateway.poller, config.poller.intervalSeconds));
        tasks.push(startLivenessSweepJob(gateway.registry, config.liveness.sweepSeconds));
        if (gateway.persistence) {
            tasks.push(startPersistenceFlushJob(gateway.persistence, config.storage.flushSeconds));
        }

        logger.info('All cron jobs started');
    });
}

// Graceful shutdown
async function shutdown(signal: string): Promise<void> {
    logger.info(`${signal} received, shutting down gracefully...`);
    for (const task of tasks) {
        task.stop();
    }
    if (gateway.persistence) {
        await gateway.persistence.flush();
    }
    process.exit(0);
}

process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
});

process.on('SIGINT', () => {
    void shutdown('SIGINT');
});

// Unhandled rejection handler
process.on('unhandledRejection', (reason, promise) => {
    logger.error('Unhandled Rejection', { reason, promise });
});

start().catch((error: unknown) => {
    logger.error('Failed to start gateway', { error: errorMessage(error) });
    process.exit(1);
});

export default app;
