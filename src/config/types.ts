/**
 * Configuration Types for guestsmith
 *
 * These types represent the host configuration file, the two resource
 * documents it points at, and the resolved specs with defaults applied.
 */

// =============================================================================
// Document Types
// =============================================================================

/**
 * Root host configuration (guestsmith.yaml or .json)
 */
export interface HostConfig {
  /** Path to the containers document, relative to this file */
  containers?: string;
  /** Path to the VMs document, relative to this file */
  vms?: string;
  /** Defaults merged beneath every resource in both documents */
  defaults?: DefaultsConfig;
  settings?: SettingsConfig;
}

/**
 * Default values applied to all resources unless overridden
 */
export interface DefaultsConfig {
  cores?: number;
  memory_mb?: number;
  disk_size_gb?: number;
  storage_pool?: string;
  network?: Partial<NetworkConfig>;
  /** Retry policy applied to health checks that declare none */
  health_check?: RetryConfig;
  unprivileged?: boolean;
  lifecycle_snapshots?: boolean;
}

/**
 * Optional host settings
 */
export interface SettingsConfig {
  /** Directory holding one record file per resource. Default: .guestsmith/state */
  state_dir?: string;
  /** Directory holding feature and application scripts */
  feature_dir?: string;
  /** Directory holding command health-check scripts */
  health_check_dir?: string;
  /** Directory holding the hypervisor's per-container config files */
  lxc_config_dir?: string;
  /** Timeout for a single hypervisor command, in seconds */
  command_timeout_s?: number;
  /** Timeout for a single feature or application script, in seconds */
  feature_timeout_s?: number;
  /** Guest agent wait for VMs after start */
  guest_agent?: RetryConfig;
}

/**
 * Attempt limit and fixed interval
 */
export interface RetryConfig {
  retries?: number;
  interval_ms?: number;
}

/**
 * Network descriptor
 */
export interface NetworkConfig {
  name?: string;
  bridge: string;
  /** "dhcp" or an address in CIDR notation */
  ip: string;
  gw?: string;
  mac_address?: string;
  nameservers?: string;
}

/**
 * Declarative readiness check
 */
export type HealthCheckConfig =
  | ({ name: string; type: 'command'; script: string; args?: string[] } & RetryConfig)
  | ({ name: string; type: 'http'; url: string; expect_status?: number; timeout_ms?: number } & RetryConfig);

/**
 * Fields shared by container and VM entries
 */
interface ResourceConfigBase {
  name: string;
  cores?: number;
  memory_mb?: number;
  disk_size_gb?: number;
  storage_pool?: string;
  network?: Partial<NetworkConfig>;
  features?: string[];
  application_script?: string;
  dependencies?: number[];
  clone_from?: number;
  clone_snapshot?: string;
  is_template?: boolean;
  template_snapshot?: string;
  lifecycle_snapshots?: boolean;
  health_checks?: HealthCheckConfig[];
}

/**
 * One entry of the containers document
 */
export interface ContainerConfig extends ResourceConfigBase {
  /** OS template file used when not cloning */
  os_template?: string;
  unprivileged?: boolean;
  volumes?: Array<{ host_path: string; mount_point: string; read_only?: boolean }>;
}

/**
 * One entry of the VMs document
 */
export interface VmConfig extends ResourceConfigBase {
  /** Cloud image imported as the boot disk when not cloning */
  image?: string;
  volumes?: Array<{ storage?: string; size_gb: number }>;
}

/**
 * Containers document: identifier -> container entry
 */
export interface ContainersDocument {
  containers: Record<string, ContainerConfig>;
}

/**
 * VMs document: identifier -> VM entry
 */
export interface VmsDocument {
  vms: Record<string, VmConfig>;
}

// =============================================================================
// Resolved Types
// =============================================================================

export type ResourceKind = 'container' | 'vm';

/**
 * Resolved network descriptor
 */
export interface ResolvedNetwork {
  interfaceName: string;
  bridge: string;
  address: string;
  gateway?: string;
  macAddress?: string;
  nameservers?: string;
}

/**
 * Resolved readiness check
 */
export type HealthCheck =
  | { name: string; type: 'command'; script: string; args: string[]; attempts: number; intervalMs: number }
  | { name: string; type: 'http'; url: string; expectStatus: number; timeoutMs: number; attempts: number; intervalMs: number };

/**
 * Desired state shared by every resource kind
 */
export interface ResourceSpecBase {
  id: number;
  name: string;
  hardware: {
    cores: number;
    memoryMb: number;
    diskSizeGb: number;
    storagePool: string;
  };
  network: ResolvedNetwork;
  features: string[];
  applicationScript?: string;
  dependencies: number[];
  cloneFrom?: { id: number; snapshot?: string };
  isTemplate: boolean;
  templateSnapshot: string;
  lifecycleSnapshots: boolean;
  healthChecks: HealthCheck[];
}

export interface ContainerVolume {
  hostPath: string;
  mountPoint: string;
  readOnly: boolean;
}

export interface ContainerSpec extends ResourceSpecBase {
  kind: 'container';
  osTemplate?: string;
  unprivileged: boolean;
  volumes: ContainerVolume[];
}

export interface VmVolume {
  storage: string;
  sizeGb: number;
}

export interface VmSpec extends ResourceSpecBase {
  kind: 'vm';
  image?: string;
  volumes: VmVolume[];
}

/**
 * Desired state of one resource, with all defaults applied
 */
export type ResourceSpec = ContainerSpec | VmSpec;

/**
 * Resolved host settings
 */
export interface ResolvedSettings {
  stateDir: string;
  featureDir: string;
  healthCheckDir: string;
  lxcConfigDir: string;
  commandTimeoutMs: number;
  featureTimeoutMs: number;
  guestAgent: { attempts: number; intervalMs: number };
}

/**
 * Fully resolved configuration ready for execution
 */
export interface ResolvedConfig {
  resources: ResourceSpec[];
  settings: ResolvedSettings;
  /** Absolute path to the host configuration file */
  configPath: string;
  /** SHA256 hash of the host configuration file (first 8 chars) */
  configHash: string;
}
