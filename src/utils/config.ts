import dotenv from 'dotenv';

dotenv.config();

export interface Config {
    port: number;
    nodeEnv: string;
    trustProxy: boolean;
    liveness: {
        thresholdSeconds: number;
        sweepSeconds: number;
    };
    poller: {
        intervalSeconds: number;
        activeWindowSeconds: number;
        campaignMaxAttempts: number;
        campaignGraceSeconds: number;
    };
    ingestion: {
        burstThreshold: number;
    };
    commands: {
        defaultCommand: string;
        fullFetch: string;
        incremental: string;
        forceFetchRepeats: number;
        maxQueueLength: number;
    };
    identity: {
        headers: string[];
    };
    storage: {
        dir: string;
        flushSeconds: number;
        maxRecords: number;
        maxLogEntries: number;
    };
    logging: {
        level: string;
        file: string;
    };
}

function getEnvVar(key: string, defaultValue?: string): string {
    const value = process.env[key] || defaultValue;
    if (!value) {
        throw new Error(`Missing required environment variable: ${key}`);
    }
    return value;
}

function getEnvInt(key: string, defaultValue: number): number {
    const value = parseInt(getEnvVar(key, String(defaultValue)), 10);
    if (isNaN(value) || value < 0) {
        throw new Error(`Environment variable ${key} must be a non-negative integer`);
    }
    return value;
}

function getEnvList(key: string, defaultValue: string): string[] {
    return getEnvVar(key, defaultValue)
        .split(',')
        .map((item) => item.trim().toLowerCase())
        .filter((item) => item.length > 0);
}

const config: Config = {
    port: getEnvInt('PORT', 9001),
    nodeEnv: getEnvVar('NODE_ENV', 'development'),
    trustProxy: getEnvVar('TRUST_PROXY', 'false') === 'true',
    liveness: {
        thresholdSeconds: getEnvInt('LIVENESS_THRESHOLD_SECONDS', 120),
        sweepSeconds: getEnvInt('LIVENESS_SWEEP_SECONDS', 30),
    },
    poller: {
        intervalSeconds: getEnvInt('POLLER_INTERVAL_SECONDS', 15),
        activeWindowSeconds: getEnvInt('POLLER_ACTIVE_WINDOW_SECONDS', 300),
        campaignMaxAttempts: getEnvInt('CAMPAIGN_MAX_ATTEMPTS', 5),
        campaignGraceSeconds: getEnvInt('CAMPAIGN_GRACE_SECONDS', 90),
    },
    ingestion: {
        burstThreshold: getEnvInt('BURST_THRESHOLD', 20),
    },
    commands: {
        defaultCommand: getEnvVar('DEFAULT_COMMAND', 'GET ATTLOG'),
        fullFetch: getEnvVar('FULL_FETCH_COMMAND', 'GET ATTLOG ALL'),
        incremental: getEnvVar('INCREMENTAL_COMMAND', 'GET ATTLOG'),
        forceFetchRepeats: getEnvInt('FORCE_FETCH_REPEATS', 3),
        maxQueueLength: getEnvInt('MAX_QUEUE_LENGTH', 50),
    },
    identity: {
        headers: getEnvList('IDENTITY_HEADERS', 'x-device-sn,sn'),
    },
    storage: {
        dir: getEnvVar('DATA_DIR', './data'),
        flushSeconds: getEnvInt('FLUSH_INTERVAL_SECONDS', 60),
        maxRecords: getEnvInt('MAX_RECORDS', 100000),
        maxLogEntries: getEnvInt('MAX_LOG_ENTRIES', 5000),
    },
    logging: {
        level: getEnvVar('LOG_LEVEL', 'info'),
        file: getEnvVar('LOG_FILE', './logs/gateway.log'),
    },
};

// Validate configuration
if (config.commands.forceFetchRepeats < 1) {
    throw new Error('FORCE_FETCH_REPEATS must be at least 1');
}
const schedules: [string, number][] = [
    ['LIVENESS_SWEEP_SECONDS', config.liveness.sweepSeconds],
    ['POLLER_INTERVAL_SECONDS', config.poller.intervalSeconds],
    ['FLUSH_INTERVAL_SECONDS', config.storage.flushSeconds],
];
for (const [key, seconds] of schedules) {
    if (seconds < 1) {
        throw new Error(`${key} must be at least 1`);
    }
}
if (config.commands.maxQueueLength < config.commands.forceFetchRepeats + 3) {
    throw new Error('MAX_QUEUE_LENGTH is too small to hold the force-fetch sequence');
}

export default config;
