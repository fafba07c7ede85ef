/**
 * Command Runtime
 *
 * Shared wiring for commands that touch the host: configuration, host lock,
 * executors, drivers, pipeline and engine. --dry-run swaps in the logging
 * executor, the dry-run drivers and an in-memory record store.
 */

import { ConfigurationStore } from '../config/store.js';
import { ConfigError, getExitCode, isGuestsmithError } from '../core/errors.js';
import { ConvergenceEngine } from '../core/engine.js';
import { FeaturePipeline } from '../core/features.js';
import { HealthGate } from '../core/health.js';
import type { ConvergeProgressCallback } from '../core/types.js';
import { ContainerDriver } from '../drivers/container.js';
import { DryRunDriver } from '../drivers/dry-run.js';
import type { DriverSet } from '../drivers/types.js';
import { VmDriver } from '../drivers/vm.js';
import { ScriptFeatureRunner } from '../hooks/feature-runner.js';
import { HostProber } from '../hooks/probes.js';
import { DryRunExecutor, ProcessExecutor, type CommandExecutor } from '../hypervisor/index.js';
import { acquireHostLock, type LockHandle } from '../lib/lock.js';
import { Logger } from '../lib/logger.js';
import { getHandoffDir, getLockPath } from '../lib/paths.js';
import { StateManager } from '../state/manager.js';
import { MemoryStateStore } from '../state/memory.js';
import type { StateStore } from '../state/types.js';
import type { OutputFormatter } from './output.js';

/**
 * Options shared by every command
 */
export interface GlobalOptions {
  json?: boolean;
  verbose?: boolean;
}

/**
 * Options for building a runtime
 */
export interface RuntimeOptions extends GlobalOptions {
  command: string;
  dryRun?: boolean;
  onProgress?: ConvergeProgressCallback;
  signal?: AbortSignal;
}

/**
 * Everything a mutating command needs
 */
export interface Runtime {
  store: ConfigurationStore;
  state: StateStore;
  engine: ConvergenceEngine;
  logger: Logger;
  dryRun: boolean;
  /** Release the host lock (no-op for dry runs) */
  release(): Promise<void>;
}

/**
 * Parse resource id arguments.
 *
 * @throws ConfigError for anything that is not a positive integer
 */
export function parseIds(args: string[]): number[] {
  return args.map((arg) => {
    if (!/^[1-9][0-9]*$/.test(arg)) {
      throw new ConfigError(
        `Invalid resource id: ${arg}`,
        'UNKNOWN_RESOURCE',
        'Resource ids are positive integers, as used in the containers and VMs documents.'
      );
    }
    return Number(arg);
  });
}

/**
 * Build drivers over an executor, wrapped for dry runs when asked.
 */
export function createDrivers(
  store: ConfigurationStore,
  executor: CommandExecutor,
  logger: Logger,
  dryRun: boolean
): DriverSet {
  const settings = store.settings;
  const container = new ContainerDriver(executor, {
    lxcConfigDir: settings.lxcConfigDir,
    logger,
    commandTimeoutMs: settings.commandTimeoutMs,
  });
  const vm = new VmDriver(executor, {
    logger,
    guestAgent: settings.guestAgent,
    commandTimeoutMs: settings.commandTimeoutMs,
  });

  if (dryRun) {
    return {
      container: new DryRunDriver(container, logger),
      vm: new DryRunDriver(vm, logger),
    };
  }
  return { container, vm };
}

/**
 * Take the host lock (unless dry-running) and wire the engine.
 *
 * @throws LockError if another invocation holds the lock
 */
export async function createRuntime(
  store: ConfigurationStore,
  options: RuntimeOptions
): Promise<Runtime> {
  const logger = Logger.fromOptions(options);
  const dryRun = options.dryRun === true;
  const settings = store.settings;
  const records = new StateManager(settings.stateDir);

  let lock: LockHandle | null = null;
  let executor: CommandExecutor;
  let state: StateStore;

  if (dryRun) {
    logger.info('[dry-run] no command will be executed and no record written');
    executor = new DryRunExecutor(logger);
    state = new MemoryStateStore(await records.list());
  } else {
    lock = await acquireHostLock(getLockPath(settings.stateDir), options.command);
    executor = new ProcessExecutor({
      timeoutMs: settings.commandTimeoutMs,
      verbose: options.verbose === true,
    });
    state = records;
  }

  const features = new FeaturePipeline(
    new ScriptFeatureRunner(executor, {
      featureDir: settings.featureDir,
      handoffDir: getHandoffDir(settings.stateDir),
      timeoutMs: settings.featureTimeoutMs,
      logger,
      dryRun,
    }),
    logger
  );
  const health = new HealthGate(new HostProber(executor, { logger, dryRun }), { logger });

  const engine = new ConvergenceEngine({
    store,
    state,
    drivers: createDrivers(store, executor, logger, dryRun),
    features,
    health,
    logger,
    ...(options.onProgress ? { onProgress: options.onProgress } : {}),
    ...(options.signal ? { signal: options.signal } : {}),
  });

  return {
    store,
    state,
    engine,
    logger,
    dryRun,
    release: async () => {
      await lock?.release();
    },
  };
}

/**
 * Abort on the first SIGINT. The engine stops at the next stage boundary;
 * a second SIGINT falls through to the default handler.
 *
 * @returns The signal and a disposer removing the handler
 */
export function abortOnInterrupt(logger: Logger): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const onInterrupt = (): void => {
    logger.warning('Interrupted: stopping after the current stage');
    controller.abort();
  };
  process.once('SIGINT', onInterrupt);
  return {
    signal: controller.signal,
    dispose: () => {
      process.removeListener('SIGINT', onInterrupt);
    },
  };
}

/**
 * Handle errors and exit appropriately.
 */
export function handleError(output: OutputFormatter, error: unknown): never {
  if (error instanceof ConfigError && error.validationErrors && error.validationErrors.length > 0) {
    output.validationError(error, error.validationErrors);
  } else if (isGuestsmithError(error)) {
    output.error(error.message, error);
  } else if (error instanceof Error) {
    output.error(error.message);
  } else {
    output.error(String(error));
  }

  output.flush();
  process.exit(getExitCode(error));
}

/**
 * Load the configuration for a command.
 */
export function loadStore(file: string): Promise<ConfigurationStore> {
  return ConfigurationStore.load(file);
}
