/**
 * Resource Driver Interface
 *
 * A driver is the capability set the convergence engine needs from a
 * hypervisor. The engine binds a driver to a spec once per resource and
 * works only against the bound view, so it never branches on kind.
 */

import type { ContainerSpec, ResourceSpec, VmSpec } from '../config/types.js';
import type { GuestStatus } from '../hypervisor/index.js';

/**
 * Live state of a resource as seen by the driver
 */
export interface ObservedResource {
  status: GuestStatus;
  /** Whether the resource has been converted to a template */
  template: boolean;
  /** One line per setting that differs from the spec, empty when in line */
  drift: string[];
  /** One line per declared volume that is not attached */
  volumesMissing: string[];
  /** Definition steps that never ran, empty once the resource is fully defined */
  incomplete: string[];
}

/**
 * Optional capability: hosts that map guest ids for unprivileged guests
 */
export interface IdentityMapCapability<S extends ResourceSpec> {
  /** Whether the identity map is present (or not needed) */
  verify(spec: S): Promise<boolean>;
  /** Forced start/stop cycle that makes the host write the map */
  cycle(spec: S): Promise<void>;
}

/**
 * Lifecycle operations for one resource kind
 */
export interface ResourceDriver<S extends ResourceSpec> {
  readonly kind: S['kind'];
  /** Observe the resource, or null when it does not exist */
  inspect(spec: S): Promise<ObservedResource | null>;
  /**
   * Create from source image/template, or clone. Given the observation of a
   * partly defined resource, only its `incomplete` steps run.
   */
  define(spec: S, observed?: ObservedResource | null): Promise<void>;
  /** Apply hardware and network settings */
  configure(spec: S): Promise<void>;
  /** Attach every declared volume that is missing */
  applyVolumes(spec: S): Promise<void>;
  /** Start and wait until the guest answers */
  start(spec: S): Promise<void>;
  /** Whether a running guest answers on its control channel, without waiting */
  isReady(spec: S): Promise<boolean>;
  stop(spec: S): Promise<void>;
  /** Remove the resource; absent resources are left alone */
  destroy(spec: S): Promise<void>;
  listSnapshots(spec: S): Promise<string[]>;
  snapshot(spec: S, name: string): Promise<void>;
  /** Strip per-instance identity before templating */
  sealIdentity(spec: S): Promise<void>;
  convertToTemplate(spec: S): Promise<void>;
  identityMap?: IdentityMapCapability<S>;
}

/**
 * A driver bound to one spec
 */
export interface BoundResource {
  readonly spec: ResourceSpec;
  inspect(): Promise<ObservedResource | null>;
  define(observed?: ObservedResource | null): Promise<void>;
  configure(): Promise<void>;
  applyVolumes(): Promise<void>;
  start(): Promise<void>;
  isReady(): Promise<boolean>;
  stop(): Promise<void>;
  destroy(): Promise<void>;
  listSnapshots(): Promise<string[]>;
  snapshot(name: string): Promise<void>;
  sealIdentity(): Promise<void>;
  convertToTemplate(): Promise<void>;
  identityMap?: {
    verify(): Promise<boolean>;
    cycle(): Promise<void>;
  };
}

/**
 * One driver per resource kind
 */
export interface DriverSet {
  container: ResourceDriver<ContainerSpec>;
  vm: ResourceDriver<VmSpec>;
}

/**
 * Bind a driver to a spec of its kind.
 */
export function bindDriver<S extends ResourceSpec>(
  driver: ResourceDriver<S>,
  spec: S
): BoundResource {
  const bound: BoundResource = {
    spec,
    inspect: () => driver.inspect(spec),
    define: (observed) => driver.define(spec, observed),
    configure: () => driver.configure(spec),
    applyVolumes: () => driver.applyVolumes(spec),
    start: () => driver.start(spec),
    isReady: () => driver.isReady(spec),
    stop: () => driver.stop(spec),
    destroy: () => driver.destroy(spec),
    listSnapshots: () => driver.listSnapshots(spec),
    snapshot: (name) => driver.snapshot(spec, name),
    sealIdentity: () => driver.sealIdentity(spec),
    convertToTemplate: () => driver.convertToTemplate(spec),
  };

  const identityMap = driver.identityMap;
  if (identityMap) {
    bound.identityMap = {
      verify: () => identityMap.verify(spec),
      cycle: () => identityMap.cycle(spec),
    };
  }

  return bound;
}

/**
 * Pick the driver for a spec's kind and bind it.
 */
export function selectDriver(spec: ResourceSpec, drivers: DriverSet): BoundResource {
  switch (spec.kind) {
    case 'container':
      return bindDriver(drivers.container, spec);
    case 'vm':
      return bindDriver(drivers.vm, spec);
  }
}
