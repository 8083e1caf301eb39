/**
 * Generational lifetime tracking for disposable drawing resources.
 *
 * Every update cycle mints a new generation token. Resources registered (or
 * re-registered) during the cycle are tagged with it; `collect()` releases every
 * resource still carrying an older token.
 *
 * Resources live in an arena keyed by a stable integer handle assigned on first
 * registration, with a resource → handle index for re-registration lookups.
 *
 * @module ResourceLedger
 */

import type { Disposable } from '../config/types';

/**
 * Opaque per-cycle identity. Compared with `===` only; never ordered.
 */
export type GenerationToken = symbol;

export type ResourceHandle = number;

export const createGenerationToken = (): GenerationToken => Symbol('ChartModel.generation');

/**
 * Raised once after a best-effort release pass in which one or more
 * `dispose()` calls threw. The pass still released every other resource.
 */
export class ResourceDisposalError extends Error {
  readonly errors: ReadonlyArray<unknown>;

  constructor(errors: ReadonlyArray<unknown>) {
    super(`ResourceLedger: ${errors.length} resource(s) failed to dispose.`);
    this.name = 'ResourceDisposalError';
    this.errors = errors;
  }
}

export interface ResourceLedgerConfig {
  /** Reads the model's current generation. */
  readonly getGeneration: () => GenerationToken;
}

export interface ResourceLedger {
  /**
   * Tags `resource` with the current generation, tracking it if it is new.
   * Registering twice in one generation leaves a single entry.
   *
   * @returns The resource's stable handle
   */
  register(resource: Disposable): ResourceHandle;
  /**
   * Disposes and forgets every resource whose generation is not the current one.
   *
   * @returns Number of resources released
   * @throws {ResourceDisposalError} After the pass, if any dispose threw
   */
  collect(): number;
  /**
   * Disposes and forgets every tracked resource regardless of generation.
   *
   * @returns Number of resources released
   * @throws {ResourceDisposalError} After the pass, if any dispose threw
   */
  clear(): number;
  has(resource: Disposable): boolean;
  getHandle(resource: Disposable): ResourceHandle | null;
  getGeneration(resource: Disposable): GenerationToken | null;
  readonly size: number;
}

type LedgerEntry = {
  readonly resource: Disposable;
  generation: GenerationToken;
};

export function createResourceLedger(config: ResourceLedgerConfig): ResourceLedger {
  const { getGeneration } = config;

  const entries = new Map<ResourceHandle, LedgerEntry>();
  const handles = new Map<Disposable, ResourceHandle>();
  let nextHandle: ResourceHandle = 1;

  function register(resource: Disposable): ResourceHandle {
    const generation = getGeneration();
    const existing = handles.get(resource);
    if (existing !== undefined) {
      const entry = entries.get(existing);
      if (entry) {
        entry.generation = generation;
        return existing;
      }
    }

    const handle = nextHandle++;
    entries.set(handle, { resource, generation });
    handles.set(resource, handle);
    return handle;
  }

  /**
   * Releases every entry accepted by `shouldRelease`, iterating a snapshot so
   * dispose callbacks that register or release resources cannot skip entries.
   * An entry is forgotten even when its dispose throws; it is never retried.
   */
  function release(shouldRelease: (entry: LedgerEntry) => boolean): number {
    const errors: unknown[] = [];
    let released = 0;

    for (const [handle, entry] of Array.from(entries)) {
      if (!shouldRelease(entry)) continue;
      try {
        entry.resource.dispose();
      } catch (error) {
        errors.push(error);
      } finally {
        entries.delete(handle);
        handles.delete(entry.resource);
        released++;
      }
    }

    if (errors.length > 0) {
      throw new ResourceDisposalError(errors);
    }
    return released;
  }

  function collect(): number {
    const current = getGeneration();
    return release((entry) => entry.generation !== current);
  }

  function clear(): number {
    return release(() => true);
  }

  function getHandle(resource: Disposable): ResourceHandle | null {
    return handles.get(resource) ?? null;
  }

  function getEntryGeneration(resource: Disposable): GenerationToken | null {
    const handle = handles.get(resource);
    if (handle === undefined) return null;
    return entries.get(handle)?.generation ?? null;
  }

  return {
    register,
    collect,
    clear,
    has: (resource) => handles.has(resource),
    getHandle,
    getGeneration: getEntryGeneration,
    get size() {
      return entries.size;
    },
  };
}
