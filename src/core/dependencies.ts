/**
 * Dependency Resolver
 *
 * Orders resources so every dependency and clone source comes before the
 * resources that need it. Derived per batch; never stored.
 */

import type { ConfigurationStore } from '../config/store.js';
import { DependencyCycleError } from './errors.js';

type Edges = (id: number) => number[];

/**
 * Find one cycle among `nodes`, following `edges` from dependent to
 * dependency. Nodes and edges are visited in ascending id order so the
 * reported cycle is deterministic.
 *
 * @returns The ids on the cycle in edge order, or null when acyclic
 */
export function detectCycle(nodes: number[], edges: Edges): number[] | null {
  const WHITE = 0;
  const GRAY = 1;
  const BLACK = 2;
  const color = new Map<number, number>();
  const stack: number[] = [];

  const visit = (node: number): number[] | null => {
    color.set(node, GRAY);
    stack.push(node);

    for (const next of [...edges(node)].sort((a, b) => a - b)) {
      const c = color.get(next) ?? WHITE;
      if (c === GRAY) {
        return stack.slice(stack.indexOf(next));
      }
      if (c === WHITE) {
        const found = visit(next);
        if (found) return found;
      }
    }

    stack.pop();
    color.set(node, BLACK);
    return null;
  };

  for (const node of [...nodes].sort((a, b) => a - b)) {
    if ((color.get(node) ?? WHITE) === WHITE) {
      const found = visit(node);
      if (found) return found;
    }
  }
  return null;
}

/**
 * Check the whole configuration for a cycle.
 */
export function findCycle(store: ConfigurationStore): number[] | null {
  return detectCycle(store.ids(), (id) => store.dependenciesOf(id));
}

/**
 * Collect the requested ids plus everything they transitively depend on.
 *
 * @throws ConfigError for an unknown id
 */
export function dependencyClosure(requested: number[], store: ConfigurationStore): Set<number> {
  const closure = new Set<number>();
  const queue = [...requested];
  while (queue.length > 0) {
    const id = queue.shift();
    if (id === undefined || closure.has(id)) continue;
    store.get(id);
    closure.add(id);
    queue.push(...store.dependenciesOf(id));
  }
  return closure;
}

/**
 * Topological order (Kahn) of the requested ids and their dependency closure.
 * Among ready ids the smallest goes first.
 *
 * @throws ConfigError for an unknown id
 * @throws DependencyCycleError naming the ids on the cycle
 */
export function resolveOrder(requested: number[], store: ConfigurationStore): number[] {
  const nodes = dependencyClosure(requested, store);

  const remaining = new Map<number, number>();
  const dependents = new Map<number, number[]>();
  for (const id of nodes) {
    const deps = store.dependenciesOf(id);
    remaining.set(id, deps.length);
    for (const dep of deps) {
      dependents.set(dep, [...(dependents.get(dep) ?? []), id]);
    }
  }

  const ready = [...nodes].filter((id) => remaining.get(id) === 0);
  const order: number[] = [];

  while (ready.length > 0) {
    ready.sort((a, b) => a - b);
    const id = ready.shift();
    if (id === undefined) break;
    order.push(id);

    for (const dependent of dependents.get(id) ?? []) {
      const left = (remaining.get(dependent) ?? 0) - 1;
      remaining.set(dependent, left);
      if (left === 0) {
        ready.push(dependent);
      }
    }
  }

  if (order.length < nodes.size) {
    const placed = new Set(order);
    const leftover = [...nodes].filter((id) => !placed.has(id));
    const cycle = detectCycle(leftover, (id) =>
      store.dependenciesOf(id).filter((dep) => !placed.has(dep))
    );
    throw new DependencyCycleError(cycle ?? leftover);
  }

  return order;
}

/**
 * Order for removing `requested`: dependents and clones before what they
 * depend on. Ids outside `requested` are left out.
 *
 * @throws ConfigError for an unknown id
 */
export function destroyOrder(requested: number[], store: ConfigurationStore): number[] {
  const wanted = new Set(requested);
  return resolveOrder(requested, store)
    .filter((id) => wanted.has(id))
    .reverse();
}
