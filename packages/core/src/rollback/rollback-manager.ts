/**
 * Rollback Manager
 * Captures rollback points of a multi-service deployment and restores the
 * deployment to any of them.
 *
 * Restore order: pre-hooks and stops for every service, then configs, then
 * images, then volumes, then starts, then post-hooks and health checks.
 * Per-service failures are recorded and never stop sibling services.
 */

import { randomBytes } from 'node:crypto';
import { rm } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { EventEmitter } from 'eventemitter3';
import {
  createChildLogger,
  CreationError,
  DEFAULT_ROLLBACK_DESCRIPTION,
  errorMessage,
  getConfig,
  loadStrategyDefinitions,
  logRollbackPhase,
  logServiceTransition,
  RewindError,
  SERVICE_ROLLBACK_STATES,
  ServiceOperationError,
  ValidationError,
  type ConfigRestoreResult,
  type Config,
  type CreateRollbackPointOptions,
  type RollbackPlan,
  type RollbackPoint,
  type RollbackReport,
  type RuntimeAdapter,
  type ServiceOperation,
  type ServiceRollbackState,
  type StepOutcome,
  type VolumeRestoreResult,
} from '@rewind/shared';
import { collectCaptureMetadata } from './capture-metadata.js';
import { mapWithConcurrency, withTimeout } from './concurrency.js';
import { ConfigSnapshotStore } from './config-snapshot-store.js';
import { FileLock } from './file-lock.js';
import { RollbackRepository } from './rollback-repository.js';
import { ServiceRollbackRun } from './service-state-machine.js';
import { StrategyRegistry } from './strategies/strategy-registry.js';
import type { ServiceRollbackStrategy, StrategyContext } from './strategies/types.js';
import {
  DEFAULT_ROLLBACK_MANAGER_CONFIG,
  type RollbackManagerConfig,
  type RollbackManagerDependencies,
  type RollbackManagerEvents,
  type RollbackOptions,
  type RollbackPhase,
} from './types.js';
import { VolumeArchiver } from './volume-archiver.js';

export const OPERATION_LOCK_FILE_NAME = 'operation.lock';
const MAX_ID_ATTEMPTS = 5;

function generateRollbackId(): string {
  return `rb-${randomBytes(6).toString('hex')}`;
}

export class RollbackManager extends EventEmitter<RollbackManagerEvents> {
  private logger = createChildLogger({ component: 'RollbackManager' });
  private readonly config: RollbackManagerConfig;
  private readonly runtime: RuntimeAdapter;
  private readonly now: () => Date;
  private readonly idGenerator: () => string;
  private readonly metadataProvider: NonNullable<RollbackManagerDependencies['metadataProvider']>;

  readonly repository: RollbackRepository;
  readonly configStore: ConfigSnapshotStore;
  readonly volumeArchiver: VolumeArchiver;
  readonly strategies: StrategyRegistry;
  private readonly operationLock: FileLock;

  private report: RollbackReport | null = null;

  constructor(dependencies: RollbackManagerDependencies, config: Partial<RollbackManagerConfig> = {}) {
    super();
    this.config = { ...DEFAULT_ROLLBACK_MANAGER_CONFIG, ...config };
    if (!Number.isInteger(this.config.maxRollbackPoints) || this.config.maxRollbackPoints < 1) {
      throw new ValidationError(`maxRollbackPoints must be a positive integer`, {
        maxRollbackPoints: this.config.maxRollbackPoints,
      });
    }

    this.runtime = dependencies.runtime;
    this.now = dependencies.now ?? (() => new Date());
    this.idGenerator = dependencies.idGenerator ?? generateRollbackId;
    this.metadataProvider = dependencies.metadataProvider ?? collectCaptureMetadata;

    const backupRoot = resolve(this.config.backupRoot);
    this.repository = new RollbackRepository({
      backupRoot,
      lockTimeoutMs: this.config.lockTimeoutMs,
      staleLockMs: this.config.staleLockMs,
    });
    this.configStore = new ConfigSnapshotStore({ projectRoot: this.config.projectRoot, backupRoot });
    this.volumeArchiver = new VolumeArchiver({
      backupRoot,
      runtime: this.runtime,
      timeoutMs: this.config.operationTimeoutMs,
    });
    // Strategies are resolved once here; unknown services fall back to generic
    this.strategies = new StrategyRegistry(this.config.strategies, this.config.timings);
    this.operationLock = new FileLock(join(backupRoot, OPERATION_LOCK_FILE_NAME), {
      timeoutMs: 0,
      staleMs: this.config.staleLockMs,
    });
  }

  /**
   * Report of the most recent rollback or dry run
   */
  get lastReport(): RollbackReport | null {
    return this.report;
  }

  // ===========================================
  // Creation
  // ===========================================

  /**
   * Capture running services' images, config files and, on request, volumes.
   * Never stops or modifies a service. Nothing reaches the index unless every
   * staging step succeeded.
   */
  async createRollbackPoint(
    description?: string,
    options: CreateRollbackPointOptions = {}
  ): Promise<RollbackPoint> {
    return this.operationLock.withLock(() => this.capture(description, options));
  }

  private async capture(
    description: string | undefined,
    options: CreateRollbackPointOptions
  ): Promise<RollbackPoint> {
    const rollbackId = await this.allocateId();
    const includeVolumes = options.includeVolumes ?? false;
    const logger = this.logger.child({ rollbackId });

    logger.info({ description, includeVolumes }, 'Creating rollback point');

    let point: RollbackPoint;
    try {
      const services = await this.resolveTargetServices(options.services);
      const imageReferences = await this.captureImages(services);

      const configHashes = await this.configStore.capture(rollbackId, this.config.configFiles);

      let volumes: string[] = [];
      if (includeVolumes) {
        const attached = await this.call('list volumes', () => this.runtime.listVolumes(services));
        const filter = this.config.volumeFilter;
        const selected = filter ? attached.filter((volume) => volume.includes(filter)) : attached;
        volumes = await this.volumeArchiver.backup(rollbackId, [...new Set(selected)]);
      }

      point = {
        id: rollbackId,
        timestamp: this.now().toISOString(),
        description: description?.trim() || DEFAULT_ROLLBACK_DESCRIPTION,
        services,
        imageReferences,
        configHashes,
        volumes,
        metadata: {
          ...(await this.metadataProvider(this.config.projectRoot)),
          includeVolumes,
          configFileCount: Object.keys(configHashes).length,
        },
        createdBy: options.createdBy ?? 'system',
      };

      await this.repository.append(point);
    } catch (error) {
      await this.discardStaging(rollbackId);
      if (error instanceof RewindError) {
        throw error;
      }
      throw new CreationError(`Could not create rollback point: ${errorMessage(error)}`, {
        rollbackId,
      });
    }

    // Indexed from here on; nothing below may remove the staged files
    logger.info(
      { services: point.services.length, configs: point.metadata.configFileCount, volumes: point.volumes.length },
      'Rollback point created'
    );
    await this.applyRetention();

    this.notify('point:created', () => this.emit('point:created', point));
    return point;
  }

  private async applyRetention(): Promise<void> {
    try {
      const retention = await this.repository.enforceRetention(this.config.maxRollbackPoints);
      for (const evicted of retention.evicted) {
        this.notify('retention:evicted', () => this.emit('retention:evicted', evicted));
      }
      for (const failure of retention.failed) {
        this.notify('retention:failed', () => this.emit('retention:failed', failure.rollbackId, failure.reason));
      }
    } catch (error) {
      this.logger.warn(
        { event: 'retention_eviction_warning', error: errorMessage(error) },
        'Retention could not be applied'
      );
    }
  }

  private async allocateId(): Promise<string> {
    for (let attempt = 0; attempt < MAX_ID_ATTEMPTS; attempt++) {
      const candidate = this.idGenerator();
      if (!(await this.repository.has(candidate))) {
        return candidate;
      }
      this.logger.warn({ rollbackId: candidate }, 'Rollback id collision, retrying');
    }
    throw new CreationError(`Could not allocate a unique rollback id after ${MAX_ID_ATTEMPTS} attempts`);
  }

  private async resolveTargetServices(requested: string[] | undefined): Promise<string[]> {
    if (requested && requested.length > 0) {
      const services = [...new Set(requested)];
      const notRunning: string[] = [];
      const states = await mapWithConcurrency(services, this.config.concurrency, (service) =>
        this.call(`is-running ${service}`, () => this.runtime.isRunning(service))
      );
      services.forEach((service, index) => {
        if (!states[index]) notRunning.push(service);
      });
      if (notRunning.length > 0) {
        throw new CreationError(`Services not running: ${notRunning.join(', ')}`, { notRunning });
      }
      return services;
    }

    const defined = await this.call('list services', () => this.runtime.listServices());
    const states = await mapWithConcurrency(defined, this.config.concurrency, (service) =>
      this.call(`is-running ${service}`, () => this.runtime.isRunning(service))
    );
    const running = defined.filter((_, index) => states[index]);
    if (running.length === 0) {
      throw new CreationError('No running services to capture');
    }
    return running;
  }

  private async captureImages(services: string[]): Promise<Record<string, string>> {
    const images = await mapWithConcurrency(services, this.config.concurrency, (service) =>
      this.call(`get image ${service}`, () => this.runtime.getImage(service))
    );
    const imageReferences: Record<string, string> = {};
    services.forEach((service, index) => {
      const image = images[index];
      if (!image) {
        throw new CreationError(`No image reference reported for ${service}`, { service });
      }
      imageReferences[service] = image;
    });
    return imageReferences;
  }

  private async discardStaging(rollbackId: string): Promise<void> {
    try {
      await rm(this.repository.pointDir(rollbackId), { recursive: true, force: true });
    } catch (error) {
      this.logger.warn(
        { rollbackId, error: errorMessage(error) },
        'Could not remove staging directory of failed rollback point'
      );
    }
  }

  // ===========================================
  // Queries
  // ===========================================

  async listRollbackPoints(): Promise<RollbackPoint[]> {
    return this.repository.list();
  }

  async getRollbackPoint(rollbackId: string): Promise<RollbackPoint> {
    return this.repository.get(rollbackId);
  }

  /**
   * Most recent rollback point, or null when there is none
   */
  async latest(): Promise<RollbackPoint | null> {
    const points = await this.repository.list();
    return points[0] ?? null;
  }

  async deleteRollbackPoint(rollbackId: string): Promise<boolean> {
    const deleted = await this.repository.delete(rollbackId);
    if (deleted) {
      this.notify('point:deleted', () => this.emit('point:deleted', rollbackId));
    }
    return deleted;
  }

  /**
   * Restore plan for a point. Reads local files only; no runtime calls.
   */
  async plan(rollbackId: string): Promise<RollbackPlan> {
    return this.buildPlan(await this.repository.get(rollbackId));
  }

  private async buildPlan(point: RollbackPoint, only?: string): Promise<RollbackPlan> {
    const configs = await this.configStore.diff(point.configHashes);
    const configsChanged = configs.some((entry) => entry.status !== 'unchanged');
    const services = only ? point.services.filter((service) => service === only) : point.services;

    return {
      rollbackId: point.id,
      description: point.description,
      timestamp: point.timestamp,
      services: services.map((service) => ({
        service,
        targetImage: point.imageReferences[service] ?? null,
        strategy: this.strategies.resolve(service).kind,
        configsChanged,
        volumesIncluded: !only && point.volumes.length > 0,
      })),
      configs,
      volumes: only ? [] : [...point.volumes],
    };
  }

  // ===========================================
  // Rollback
  // ===========================================

  /**
   * Restore the whole deployment to a rollback point. True only when every
   * service came back healthy; details are in `lastReport`.
   * Throws NotFoundError for an unknown id.
   */
  async rollback(rollbackId: string, options: RollbackOptions = {}): Promise<boolean> {
    const report = await this.execute(rollbackId, options);
    return report.success;
  }

  async execute(rollbackId: string, options: RollbackOptions = {}): Promise<RollbackReport> {
    const point = await this.repository.get(rollbackId);
    const plan = await this.buildPlan(point);

    if (options.dryRun) {
      return this.finishDryRun(plan);
    }

    return this.operationLock.withLock(() => this.restoreAll(point, plan));
  }

  /**
   * Roll back a single service of a point through its strategy's own
   * rollback hook. Configs are restored first; volumes are not touched.
   */
  async rollbackService(
    rollbackId: string,
    service: string,
    options: RollbackOptions = {}
  ): Promise<RollbackReport> {
    const point = await this.repository.get(rollbackId);
    if (!point.services.includes(service)) {
      throw new ValidationError(`Service '${service}' is not part of rollback point ${rollbackId}`, {
        rollbackId,
        service,
      });
    }
    const plan = await this.buildPlan(point, service);

    if (options.dryRun) {
      return this.finishDryRun(plan);
    }

    return this.operationLock.withLock(() => this.restoreOne(point, plan, service));
  }

  private finishDryRun(plan: RollbackPlan): RollbackReport {
    const report: RollbackReport = {
      rollbackId: plan.rollbackId,
      success: true,
      dryRun: true,
      plan,
      services: [],
      volumeResults: [],
      startedAt: this.now().toISOString(),
      durationMs: 0,
    };
    this.logger.info({ rollbackId: plan.rollbackId, services: plan.services.length }, 'Dry run planned');
    this.report = report;
    return report;
  }

  private async restoreAll(point: RollbackPoint, plan: RollbackPlan): Promise<RollbackReport> {
    const startedAt = Date.now();
    const startedAtIso = this.now().toISOString();
    this.notify('rollback:started', () => this.emit('rollback:started', point));
    this.logger.info(
      { rollbackId: point.id, description: point.description, services: point.services },
      'Starting rollback'
    );

    const runs = point.services.map((service) => this.createRun(point.id, service));
    const { concurrency } = this.config;

    // 1. Pre-hooks and stops; every stop is issued before any restore begins
    this.enterPhase(point.id, 'stop');
    await mapWithConcurrency(runs, concurrency, async (run) => {
      const strategy = this.strategies.resolve(run.service);
      run.transition(SERVICE_ROLLBACK_STATES.PRE_HOOK);
      await this.hookStep(run, 'pre_rollback', () => strategy.preRollback(this.context(point, run.service)));
      await this.runtimeStep(run, 'stop', () => this.runtime.stop(run.service), SERVICE_ROLLBACK_STATES.STOPPED);
    });

    // 2. Configs
    this.enterPhase(point.id, 'configs');
    const configResult = await this.restoreConfigs(point);

    // 3. Images
    this.enterPhase(point.id, 'images');
    await mapWithConcurrency(runs, concurrency, async (run) => {
      const image = point.imageReferences[run.service];
      if (!image) {
        run.record(
          'restore_image',
          { status: 'skipped', message: 'no image recorded' },
          0,
          SERVICE_ROLLBACK_STATES.IMAGE_RESTORED
        );
        return;
      }
      await this.runtimeStep(
        run,
        'restore_image',
        () => this.runtime.restoreImage(run.service, image),
        SERVICE_ROLLBACK_STATES.IMAGE_RESTORED
      );
    });

    // 4. Volumes, only when the point carries them
    let volumeResults: VolumeRestoreResult[] = [];
    if (point.volumes.length > 0) {
      this.enterPhase(point.id, 'volumes');
      volumeResults = await this.volumeArchiver.restore(point.id, point.volumes);
    }

    const sharedRestoreOk =
      configResult.failed.length === 0 && volumeResults.every((result) => result.succeeded);
    if (sharedRestoreOk) {
      for (const run of runs) {
        run.transition(SERVICE_ROLLBACK_STATES.CONFIG_RESTORED);
      }
    }

    // 5. Start every service, including ones that failed earlier steps
    this.enterPhase(point.id, 'start');
    await mapWithConcurrency(runs, concurrency, (run) =>
      this.runtimeStep(run, 'start', () => this.runtime.start(run.service), SERVICE_ROLLBACK_STATES.STARTED)
    );

    // 6. Post-hooks and health
    this.enterPhase(point.id, 'verify');
    await mapWithConcurrency(runs, concurrency, (run) =>
      this.verify(run, this.strategies.resolve(run.service), this.context(point, run.service))
    );

    const services = runs.map((run) => run.toResult());
    const success = sharedRestoreOk && services.every((result) => result.succeeded);

    return this.complete({
      rollbackId: point.id,
      success,
      dryRun: false,
      plan,
      services,
      configResult,
      volumeResults,
      startedAt: startedAtIso,
      durationMs: Date.now() - startedAt,
    });
  }

  private async restoreOne(
    point: RollbackPoint,
    plan: RollbackPlan,
    service: string
  ): Promise<RollbackReport> {
    const startedAt = Date.now();
    const startedAtIso = this.now().toISOString();
    const strategy = this.strategies.resolve(service);
    const context = this.context(point, service);
    const run = this.createRun(point.id, service);

    this.notify('rollback:started', () => this.emit('rollback:started', point));
    this.logger.info({ rollbackId: point.id, service, strategy: strategy.kind }, 'Starting service rollback');

    run.transition(SERVICE_ROLLBACK_STATES.PRE_HOOK);
    await this.hookStep(run, 'pre_rollback', () => strategy.preRollback(context));

    this.enterPhase(point.id, 'configs');
    const configResult = await this.restoreConfigs(point);

    this.enterPhase(point.id, 'start');
    const stepStart = Date.now();
    const outcome = await this.safeOutcome(() => strategy.rollback(context));
    run.record('rollback', outcome, Date.now() - stepStart, SERVICE_ROLLBACK_STATES.STARTED);
    if (outcome.status === 'failed') {
      this.logServiceFailure(new ServiceOperationError(service, 'rollback', outcome.message ?? 'failed'));
    }

    this.enterPhase(point.id, 'verify');
    await this.verify(run, strategy, context, run.hasFailed('rollback'));

    const result = run.toResult();
    return this.complete({
      rollbackId: point.id,
      success: configResult.failed.length === 0 && result.succeeded,
      dryRun: false,
      plan,
      services: [result],
      configResult,
      volumeResults: [],
      startedAt: startedAtIso,
      durationMs: Date.now() - startedAt,
    });
  }

  private complete(report: RollbackReport): RollbackReport {
    this.report = report;
    const unhealthy = report.services.filter((result) => !result.succeeded).map((result) => result.service);

    if (report.success) {
      this.logger.info({ rollbackId: report.rollbackId, durationMs: report.durationMs }, 'Rollback completed');
    } else {
      this.logger.warn(
        {
          rollbackId: report.rollbackId,
          unhealthy,
          configFailures: report.configResult?.failed.length ?? 0,
          volumeFailures: report.volumeResults.filter((result) => !result.succeeded).length,
        },
        'Rollback finished with failures'
      );
    }

    this.notify('rollback:completed', () => this.emit('rollback:completed', report));
    return report;
  }

  // ===========================================
  // Step helpers
  // ===========================================

  private createRun(rollbackId: string, service: string): ServiceRollbackRun {
    return new ServiceRollbackRun(service, (name, from, to) => {
      logServiceTransition(rollbackId, name, from, to);
      this.notify('service:transition', () => this.emit('service:transition', rollbackId, name, from, to));
    });
  }

  /**
   * Listener exceptions are logged and never interrupt an operation
   */
  private notify(event: keyof RollbackManagerEvents, emit: () => void): void {
    try {
      emit();
    } catch (error) {
      this.logger.error({ event, error: errorMessage(error) }, 'Event listener failed');
    }
  }

  private context(point: RollbackPoint, service: string): StrategyContext {
    return {
      runtime: this.runtime,
      rollbackId: point.id,
      targetImage: point.imageReferences[service] ?? null,
      operationTimeoutMs: this.config.operationTimeoutMs,
    };
  }

  private enterPhase(rollbackId: string, phase: RollbackPhase): void {
    logRollbackPhase(rollbackId, phase);
    this.notify('rollback:phase', () => this.emit('rollback:phase', rollbackId, phase));
  }

  private async restoreConfigs(point: RollbackPoint): Promise<ConfigRestoreResult> {
    try {
      return await this.configStore.restore(point.id, this.config.projectRoot, point.configHashes);
    } catch (error) {
      const reason = errorMessage(error);
      this.logger.error({ rollbackId: point.id, error: reason }, 'Config restore failed');
      return {
        restored: [],
        failed: Object.keys(point.configHashes).map((path) => ({ path, reason })),
      };
    }
  }

  /**
   * Post-hook then health check. A service that did not start is marked
   * unhealthy without probing it.
   */
  private async verify(
    run: ServiceRollbackRun,
    strategy: ServiceRollbackStrategy,
    context: StrategyContext,
    startFailed = run.hasFailed('start')
  ): Promise<void> {
    if (startFailed) {
      run.record('verify_health', { status: 'skipped', message: 'service did not start' }, 0);
      run.transition(SERVICE_ROLLBACK_STATES.UNHEALTHY);
      return;
    }

    await this.hookStep(run, 'post_rollback', () => strategy.postRollback(context));

    run.transition(SERVICE_ROLLBACK_STATES.HEALTH_CHECKING);
    const stepStart = Date.now();
    let healthy: boolean;
    try {
      healthy = await strategy.verifyHealth(context);
    } catch (error) {
      this.logger.warn({ service: run.service, error: errorMessage(error) }, 'Health check threw');
      healthy = false;
    }

    run.record(
      'verify_health',
      healthy ? { status: 'succeeded' } : { status: 'failed', message: 'health check failed' },
      Date.now() - stepStart
    );
    run.transition(healthy ? SERVICE_ROLLBACK_STATES.HEALTHY : SERVICE_ROLLBACK_STATES.UNHEALTHY);
  }

  private async hookStep(
    run: ServiceRollbackRun,
    operation: 'pre_rollback' | 'post_rollback',
    hook: () => Promise<StepOutcome>
  ): Promise<void> {
    const stepStart = Date.now();
    const outcome = await this.safeOutcome(hook);
    run.record(operation, outcome, Date.now() - stepStart);
    if (outcome.status === 'failed') {
      this.logger.warn(
        { service: run.service, operation, reason: outcome.message },
        'Service hook failed, continuing'
      );
    }
  }

  /**
   * One bounded runtime call for one service, recorded on its run
   */
  private async runtimeStep(
    run: ServiceRollbackRun,
    operation: Extract<ServiceOperation, 'stop' | 'restore_image' | 'start'>,
    call: () => Promise<boolean>,
    onSuccess: ServiceRollbackState
  ): Promise<void> {
    const stepStart = Date.now();
    let outcome: StepOutcome;
    try {
      const ok = await this.call(`${operation} ${run.service}`, call);
      outcome = ok ? { status: 'succeeded' } : { status: 'failed', message: 'runtime reported failure' };
    } catch (error) {
      outcome = { status: 'failed', message: errorMessage(error) };
    }

    run.record(operation, outcome, Date.now() - stepStart, onSuccess);
    if (outcome.status === 'failed') {
      this.logServiceFailure(
        new ServiceOperationError(run.service, operation, outcome.message ?? 'failed')
      );
    }
  }

  private async safeOutcome(hook: () => Promise<StepOutcome>): Promise<StepOutcome> {
    try {
      return await hook();
    } catch (error) {
      return { status: 'failed', message: errorMessage(error) };
    }
  }

  private logServiceFailure(error: ServiceOperationError): void {
    this.logger.warn(
      { service: error.service, operation: error.operation, code: error.code },
      error.message
    );
  }

  private call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    return withTimeout(fn(), this.config.operationTimeoutMs, operation);
  }
}

/**
 * Build a manager from environment configuration and the strategies file
 */
export function createRollbackManagerFromConfig(
  runtime: RuntimeAdapter,
  config: Config = getConfig()
): RollbackManager {
  const projectRoot = resolve(config.rollback.projectRoot);
  const strategies = loadStrategyDefinitions(resolve(projectRoot, config.rollback.strategiesFile));

  return new RollbackManager(
    { runtime },
    {
      backupRoot: resolve(projectRoot, config.rollback.backupDir),
      projectRoot,
      maxRollbackPoints: config.rollback.maxRollbackPoints,
      configFiles: config.rollback.configFiles,
      ...(config.rollback.volumeFilter !== undefined && {
        volumeFilter: config.rollback.volumeFilter,
      }),
      operationTimeoutMs: config.runtime.operationTimeoutMs,
      concurrency: config.runtime.concurrency,
      lockTimeoutMs: config.lock.timeoutMs,
      staleLockMs: config.lock.staleMs,
      strategies,
      timings: {
        healthTimeoutMs: config.runtime.healthTimeoutMs,
        httpHealthTimeoutMs: config.runtime.httpHealthTimeoutMs,
      },
    }
  );
}
