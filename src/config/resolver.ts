/**
 * Configuration Resolver
 *
 * Applies defaults, merges per-resource overrides, expands paths and checks
 * the cross-document invariants, producing resource specs ready for
 * convergence.
 */

import { dirname, resolve } from 'node:path';

import { ConfigError } from '../core/errors.js';
import { computeFileHash } from '../lib/hash.js';
import { expandPath, getDefaultStateDir } from '../lib/paths.js';
import type {
  ContainerConfig,
  ContainerSpec,
  ContainersDocument,
  DefaultsConfig,
  HealthCheck,
  HealthCheckConfig,
  HostConfig,
  ResolvedConfig,
  ResolvedNetwork,
  ResolvedSettings,
  ResourceSpec,
  ResourceSpecBase,
  VmConfig,
  VmSpec,
  VmsDocument,
} from './types.js';

/**
 * Built-in defaults, beneath the host `defaults` block
 */
export const DEFAULTS = {
  cores: 1,
  memoryMb: 2048,
  diskSizeGb: 8,
  storagePool: 'local-lvm',
  interfaceName: 'eth0',
  bridge: 'vmbr0',
  address: 'dhcp',
  unprivileged: true,
  lifecycleSnapshots: false,
  templateSnapshot: 'template',
  healthCheck: { attempts: 10, intervalMs: 3000, expectStatus: 200, timeoutMs: 5000 },
  lxcConfigDir: '/etc/pve/lxc',
  commandTimeoutS: 300,
  featureTimeoutS: 1800,
  guestAgent: { attempts: 60, intervalMs: 5000 },
} as const;

/**
 * Parsed documents handed to the resolver
 */
export interface ConfigDocuments {
  host: HostConfig;
  containers?: ContainersDocument;
  vms?: VmsDocument;
}

function resolveSettings(host: HostConfig, configPath: string): ResolvedSettings {
  const basePath = dirname(configPath);
  const settings = host.settings ?? {};

  return {
    stateDir: settings.state_dir
      ? expandPath(settings.state_dir, basePath)
      : getDefaultStateDir(configPath),
    featureDir: expandPath(settings.feature_dir ?? 'features', basePath),
    healthCheckDir: expandPath(settings.health_check_dir ?? 'health_checks', basePath),
    lxcConfigDir: expandPath(settings.lxc_config_dir ?? DEFAULTS.lxcConfigDir, basePath),
    commandTimeoutMs: (settings.command_timeout_s ?? DEFAULTS.commandTimeoutS) * 1000,
    featureTimeoutMs: (settings.feature_timeout_s ?? DEFAULTS.featureTimeoutS) * 1000,
    guestAgent: {
      attempts: settings.guest_agent?.retries ?? DEFAULTS.guestAgent.attempts,
      intervalMs: settings.guest_agent?.interval_ms ?? DEFAULTS.guestAgent.intervalMs,
    },
  };
}

function resolveNetwork(
  entry: ContainerConfig | VmConfig,
  defaults: DefaultsConfig
): ResolvedNetwork {
  const merged = { ...defaults.network, ...entry.network };
  const network: ResolvedNetwork = {
    interfaceName: merged.name ?? DEFAULTS.interfaceName,
    bridge: merged.bridge ?? DEFAULTS.bridge,
    address: merged.ip ?? DEFAULTS.address,
  };
  if (merged.gw) network.gateway = merged.gw;
  if (merged.mac_address) network.macAddress = merged.mac_address.toUpperCase();
  if (merged.nameservers) network.nameservers = merged.nameservers;
  return network;
}

function resolveHealthCheck(
  check: HealthCheckConfig,
  defaults: DefaultsConfig,
  settings: ResolvedSettings
): HealthCheck {
  const attempts = check.retries ?? defaults.health_check?.retries ?? DEFAULTS.healthCheck.attempts;
  const intervalMs =
    check.interval_ms ?? defaults.health_check?.interval_ms ?? DEFAULTS.healthCheck.intervalMs;

  if (check.type === 'command') {
    return {
      name: check.name,
      type: 'command',
      script: expandPath(check.script, settings.healthCheckDir),
      args: check.args ?? [],
      attempts,
      intervalMs,
    };
  }

  return {
    name: check.name,
    type: 'http',
    url: check.url,
    expectStatus: check.expect_status ?? DEFAULTS.healthCheck.expectStatus,
    timeoutMs: check.timeout_ms ?? DEFAULTS.healthCheck.timeoutMs,
    attempts,
    intervalMs,
  };
}

function resolveBase(
  id: number,
  entry: ContainerConfig | VmConfig,
  defaults: DefaultsConfig,
  settings: ResolvedSettings
): ResourceSpecBase {
  const base: ResourceSpecBase = {
    id,
    name: entry.name,
    hardware: {
      cores: entry.cores ?? defaults.cores ?? DEFAULTS.cores,
      memoryMb: entry.memory_mb ?? defaults.memory_mb ?? DEFAULTS.memoryMb,
      diskSizeGb: entry.disk_size_gb ?? defaults.disk_size_gb ?? DEFAULTS.diskSizeGb,
      storagePool: entry.storage_pool ?? defaults.storage_pool ?? DEFAULTS.storagePool,
    },
    network: resolveNetwork(entry, defaults),
    features: entry.features ?? [],
    dependencies: entry.dependencies ?? [],
    isTemplate: entry.is_template ?? false,
    templateSnapshot: entry.template_snapshot ?? DEFAULTS.templateSnapshot,
    lifecycleSnapshots:
      entry.lifecycle_snapshots ?? defaults.lifecycle_snapshots ?? DEFAULTS.lifecycleSnapshots,
    healthChecks: (entry.health_checks ?? []).map((check) =>
      resolveHealthCheck(check, defaults, settings)
    ),
  };

  if (entry.application_script) {
    base.applicationScript = expandPath(entry.application_script, settings.featureDir);
  }
  if (entry.clone_from !== undefined) {
    base.cloneFrom = entry.clone_snapshot
      ? { id: entry.clone_from, snapshot: entry.clone_snapshot }
      : { id: entry.clone_from };
  }

  return base;
}

function resolveContainer(
  id: number,
  entry: ContainerConfig,
  defaults: DefaultsConfig,
  settings: ResolvedSettings,
  basePath: string
): ContainerSpec {
  const spec: ContainerSpec = {
    ...resolveBase(id, entry, defaults, settings),
    kind: 'container',
    unprivileged: entry.unprivileged ?? defaults.unprivileged ?? DEFAULTS.unprivileged,
    volumes: (entry.volumes ?? []).map((volume) => ({
      hostPath: expandPath(volume.host_path, basePath),
      mountPoint: volume.mount_point,
      readOnly: volume.read_only ?? false,
    })),
  };
  // Storage references such as local:vztmpl/debian.tar.zst are not paths
  if (entry.os_template) spec.osTemplate = entry.os_template;
  return spec;
}

function resolveVm(
  id: number,
  entry: VmConfig,
  defaults: DefaultsConfig,
  settings: ResolvedSettings,
  basePath: string
): VmSpec {
  const spec: VmSpec = {
    ...resolveBase(id, entry, defaults, settings),
    kind: 'vm',
    volumes: (entry.volumes ?? []).map((volume) => ({
      storage: volume.storage ?? entry.storage_pool ?? defaults.storage_pool ?? DEFAULTS.storagePool,
      sizeGb: volume.size_gb,
    })),
  };
  if (entry.image) spec.image = expandPath(entry.image, basePath);
  return spec;
}

/**
 * Check invariants that span entries and documents.
 *
 * @returns One message per violation, empty when the configuration holds
 */
export function checkInvariants(resources: ResourceSpec[]): Array<{ path: string; message: string }> {
  const violations: Array<{ path: string; message: string }> = [];
  const byId = new Map<number, ResourceSpec>();

  for (const spec of resources) {
    const path = `/${spec.kind === 'container' ? 'containers' : 'vms'}/${spec.id}`;
    const existing = byId.get(spec.id);
    if (existing) {
      violations.push({
        path,
        message: `id ${spec.id} is defined as both a container and a vm`,
      });
      continue;
    }
    byId.set(spec.id, spec);
  }

  for (const spec of resources) {
    const path = `/${spec.kind === 'container' ? 'containers' : 'vms'}/${spec.id}`;

    for (const dep of spec.dependencies) {
      if (dep === spec.id) {
        violations.push({ path: `${path}/dependencies`, message: 'resource depends on itself' });
      } else if (!byId.has(dep)) {
        violations.push({ path: `${path}/dependencies`, message: `unknown dependency ${dep}` });
      }
    }

    if (spec.cloneFrom) {
      const source = byId.get(spec.cloneFrom.id);
      if (spec.cloneFrom.id === spec.id) {
        violations.push({ path: `${path}/clone_from`, message: 'resource clones itself' });
      } else if (!source) {
        violations.push({ path: `${path}/clone_from`, message: `unknown clone source ${spec.cloneFrom.id}` });
      } else if (source.kind !== spec.kind) {
        violations.push({
          path: `${path}/clone_from`,
          message: `clone source ${source.id} is a ${source.kind}, not a ${spec.kind}`,
        });
      }
    } else if (spec.kind === 'container' && !spec.osTemplate) {
      violations.push({ path, message: 'container needs os_template or clone_from' });
    } else if (spec.kind === 'vm' && !spec.image) {
      violations.push({ path, message: 'vm needs image or clone_from' });
    }
  }

  return violations;
}

/**
 * Clones of a template without `clone_snapshot` start from the snapshot the
 * template finalize takes.
 */
function defaultCloneSnapshots(resources: ResourceSpec[]): void {
  const byId = new Map(resources.map((spec) => [spec.id, spec]));
  for (const spec of resources) {
    if (!spec.cloneFrom || spec.cloneFrom.snapshot !== undefined) continue;
    const source = byId.get(spec.cloneFrom.id);
    if (source?.isTemplate) {
      spec.cloneFrom = { id: source.id, snapshot: source.templateSnapshot };
    }
  }
}

/**
 * Resolve validated documents into resource specs.
 *
 * @param documents - Validated host, containers and VMs documents
 * @param configPath - Path to the host configuration file
 * @returns Fully resolved configuration ready for execution
 * @throws ConfigError if a cross-document invariant is violated
 */
export async function resolveConfig(
  documents: ConfigDocuments,
  configPath: string
): Promise<ResolvedConfig> {
  const absoluteConfigPath = resolve(configPath);
  const basePath = dirname(absoluteConfigPath);
  const defaults = documents.host.defaults ?? {};
  const settings = resolveSettings(documents.host, absoluteConfigPath);

  const resources: ResourceSpec[] = [];
  for (const [key, entry] of Object.entries(documents.containers?.containers ?? {})) {
    resources.push(resolveContainer(Number(key), entry, defaults, settings, basePath));
  }
  for (const [key, entry] of Object.entries(documents.vms?.vms ?? {})) {
    resources.push(resolveVm(Number(key), entry, defaults, settings, basePath));
  }

  const violations = checkInvariants(resources);
  if (violations.length > 0) {
    throw new ConfigError(
      `Configuration has ${violations.length} invariant violation(s)`,
      'CONFIG_INVARIANT_VIOLATED',
      'Fix the listed entries in the containers or VMs document.',
      absoluteConfigPath,
      violations
    );
  }

  defaultCloneSnapshots(resources);
  resources.sort((a, b) => a.id - b.id);

  return {
    resources,
    settings,
    configPath: absoluteConfigPath,
    configHash: await computeFileHash(absoluteConfigPath),
  };
}
