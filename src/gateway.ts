import { Clock } from './types';
import { Config } from './utils/config';
import { KeyedMutex } from './utils/keyed-mutex';
import { LogSinkService } from './services/log-sink.service';
import { MemoryRecordStore } from './services/record-store.service';
import { DeviceRegistryService } from './services/device-registry.service';
import { CommandDispatcherService } from './services/command-dispatcher.service';
import { IdentityService } from './services/identity.service';
import { IngestionService } from './services/ingestion.service';
import { IclockService } from './services/iclock.service';
import { ControlService } from './services/control.service';
import { PersistenceService } from './services/persistence.service';
import { AutonomousPoller } from './jobs/autonomous-poller.job';

export interface Gateway {
    logs: LogSinkService;
    store: MemoryRecordStore;
    registry: DeviceRegistryService;
    dispatcher: CommandDispatcherService;
    identity: IdentityService;
    ingestion: IngestionService;
    poller: AutonomousPoller;
    iclock: IclockService;
    control: ControlService;
    persistence: PersistenceService | null;
}

export interface GatewayOptions {
    clock?: Clock;
    /** Keep everything in memory (no data directory). */
    inMemory?: boolean;
}

/**
 * Build every core component once. Handlers and jobs receive these instances.
 */
export function createGateway(config: Config, options: GatewayOptions = {}): Gateway {
    const clock = options.clock ?? Date.now;

    const logs = new LogSinkService(config.storage.maxLogEntries, clock);
    const store = new MemoryRecordStore(config.storage.maxRecords);
    const registry = new DeviceRegistryService(logs, config.liveness.thresholdSeconds * 1000, clock);
    const dispatcher = new CommandDispatcherService(
        {
            defaultCommand: config.commands.defaultCommand,
            fullFetchCommand: config.commands.fullFetch,
            forceFetchRepeats: config.commands.forceFetchRepeats,
            maxQueueLength: config.commands.maxQueueLength,
        },
        logs,
        clock
    );
    const identity = new IdentityService(config.identity.headers, logs);
    const ingestion = new IngestionService(store, registry, logs, clock);
    const poller = new AutonomousPoller(
        registry,
        dispatcher,
        logs,
        {
            activeWindowMs: config.poller.activeWindowSeconds * 1000,
            campaignMaxAttempts: config.poller.campaignMaxAttempts,
            campaignGraceMs: config.poller.campaignGraceSeconds * 1000,
            incrementalCommand: config.commands.incremental,
        },
        clock
    );
    const persistence = options.inMemory
        ? null
        : new PersistenceService(config.storage.dir, { records: store, registry, logs });

    const iclock = new IclockService({
        identity,
        registry,
        dispatcher,
        ingestion,
        logSink: logs,
        mutex: new KeyedMutex(),
        burstThreshold: config.ingestion.burstThreshold,
        persistence: persistence ?? undefined,
    });
    const control = new ControlService({ registry, dispatcher, poller, store, logs, clock });

    return { logs, store, registry, dispatcher, identity, ingestion, poller, iclock, control, persistence };
}
