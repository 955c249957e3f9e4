import {
  type Config,
  type ExchangeInfo,
  type PollerHealth,
  type ResourceKind,
  type ServiceStatus,
  type SuccessSnapshot,
} from "@refdata/shared";
import type { LogWriteError } from "./errors.js";
import { resourceFetchers, type ExchangeClient, type ResourceFetchers } from "./exchange/types.js";
import { PollingScheduler } from "./polling/polling-scheduler.js";
import { ResourcePoller, type TickOutcome } from "./polling/resource-poller.js";
import { DataService } from "./query/data-service.js";
import { RateLimiter } from "./rate-limit/rate-limiter.js";
import type { SnapshotLog } from "./storage/snapshot-log.js";
import { StateStore } from "./storage/state-store.js";
import { createLogger } from "./utils/logger.js";

const log = createLogger("pipeline");

export type PipelineOptions = {
  config: Config;
  client: ExchangeClient;
  log: SnapshotLog;
  /** Without credentials the accountInfo poller is not started. */
  hasCredentials: boolean;
  now?: () => number;
};

type ManagedPoller = {
  readonly kind: ResourceKind;
  readonly durabilityGaps: number;
  tick(): Promise<TickOutcome>;
  init(): Promise<void>;
  whenIdle(): Promise<void>;
  health(): PollerHealth;
};

export type Stoppable = { stop(): Promise<void> };

/**
 * Wires limiter, pollers, log, store and scheduler together. The log is
 * authoritative; on start the store is warm-started from it and each
 * poller resumes numbering after its last logged sequence.
 */
export class Pipeline {
  readonly store = new StateStore();
  readonly limiter: RateLimiter;
  readonly scheduler: PollingScheduler;
  readonly data: DataService;

  private options: PipelineOptions;
  private now: () => number;
  private fetchers: ResourceFetchers;
  private pollers = new Map<ResourceKind, ManagedPoller>();
  private transports: Stoppable[] = [];
  private startedAt = 0;
  private running = false;

  constructor(options: PipelineOptions) {
    this.options = options;
    this.now = options.now ?? Date.now;
    this.limiter = new RateLimiter(options.config.rateLimits, { now: this.now });
    this.scheduler = new PollingScheduler({ pollOnStart: options.config.poller.pollOnStart });
    this.data = new DataService(this.store);
    this.fetchers = resourceFetchers(options.client);

    this.addPoller("exchangeInfo", (snapshot) => this.refreshRateLimits(snapshot.payload));
    this.addPoller("accountInfo");
    this.addPoller("systemStatus");
  }

  get isRunning(): boolean {
    return this.running;
  }

  async start(): Promise<void> {
    if (this.running) throw new Error("Pipeline already running");

    await this.store.warmStart(this.options.log);
    const cached = this.store.read("exchangeInfo");
    if (cached) this.refreshRateLimits(cached.payload);

    for (const poller of this.pollers.values()) {
      await poller.init();
    }

    this.startedAt = this.now();
    this.running = true;
    for (const poller of this.pollers.values()) {
      this.scheduler.schedule(poller, this.options.config.resources[poller.kind].intervalMs);
    }
    log.info("Pipeline started", { pollers: [...this.pollers.keys()] });
  }

  /** Transports are stopped after polling halts and before the log closes. */
  addTransport(transport: Stoppable): void {
    this.transports.push(transport);
  }

  async stop(): Promise<void> {
    this.running = false;
    await this.scheduler.drain();
    await Promise.all([...this.pollers.values()].map((p) => p.whenIdle()));
    for (const transport of this.transports) {
      await transport.stop();
    }
    this.transports = [];
    await this.options.log.close();
    log.info("Pipeline stopped");
  }

  /** Manual poll; goes through the same coalescing and rate limiting as a timer tick. */
  refresh(kind: ResourceKind): Promise<TickOutcome> | undefined {
    if (!this.running) throw new Error("Pipeline is not running");
    return this.pollers.get(kind)?.tick();
  }

  health(): PollerHealth[] {
    return [...this.pollers.values()].map((p) => p.health());
  }

  status(): ServiceStatus {
    let durabilityGaps = 0;
    for (const poller of this.pollers.values()) durabilityGaps += poller.durabilityGaps;
    return {
      startedAt: this.startedAt,
      pollers: this.health(),
      rateLimits: this.limiter.usage(),
      store: this.store.stats(),
      durabilityGaps,
    };
  }

  private addPoller<K extends ResourceKind>(
    kind: K,
    onApplied?: (snapshot: SuccessSnapshot<K>) => void,
  ): void {
    const settings = this.options.config.resources[kind];
    if (!settings.enabled) {
      log.info("Poller disabled by config", { kind });
      return;
    }
    if (kind === "accountInfo" && !this.options.hasCredentials) {
      log.warn("No API credentials, accountInfo will not be polled", {
        apiKeyEnv: this.options.config.exchange.apiKeyEnv,
        apiSecretEnv: this.options.config.exchange.apiSecretEnv,
      });
      return;
    }

    const poller = new ResourcePoller<K>({
      kind,
      fetch: this.fetchers[kind],
      limiter: this.limiter,
      bucket: settings.bucket,
      weight: settings.weight,
      log: this.options.log,
      store: this.store,
      publishOnLogFailure: this.options.config.poller.publishOnLogFailure,
      onApplied,
      now: this.now,
    });
    poller.on("durability-gap", (err: LogWriteError) => {
      log.error("Durability gap", { kind, sequence: err.sequence });
    });
    this.pollers.set(kind, poller);
  }

  private refreshRateLimits(info: ExchangeInfo): void {
    if (info.rateLimits.length === 0) return;
    this.limiter.configure(info.rateLimits);
  }
}
