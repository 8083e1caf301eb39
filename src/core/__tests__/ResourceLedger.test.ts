/**
 * Tests for generational resource tracking.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { createGenerationToken, createResourceLedger, ResourceDisposalError } from '../ResourceLedger';
import type { GenerationToken, ResourceLedger } from '../ResourceLedger';

const createMockResource = (label: string) => ({
  label,
  dispose: vi.fn(),
});

describe('ResourceLedger', () => {
  let generation: GenerationToken;
  let ledger: ResourceLedger;

  beforeEach(() => {
    generation = createGenerationToken();
    ledger = createResourceLedger({ getGeneration: () => generation });
  });

  it('mints distinct generation tokens', () => {
    expect(createGenerationToken()).not.toBe(createGenerationToken());
  });

  it('keeps a single entry when a resource is registered twice in one generation', () => {
    const resource = createMockResource('r');

    const first = ledger.register(resource);
    const second = ledger.register(resource);

    expect(first).toBe(second);
    expect(ledger.size).toBe(1);
    expect(ledger.getGeneration(resource)).toBe(generation);
  });

  it('assigns stable increasing handles', () => {
    const a = createMockResource('a');
    const b = createMockResource('b');

    expect(ledger.register(a)).toBe(1);
    expect(ledger.register(b)).toBe(2);

    generation = createGenerationToken();
    expect(ledger.register(a)).toBe(1);
    expect(ledger.getHandle(b)).toBe(2);
  });

  it('retags a resource re-registered in a later generation', () => {
    const resource = createMockResource('r');
    ledger.register(resource);

    const next = createGenerationToken();
    generation = next;
    ledger.register(resource);

    expect(ledger.getGeneration(resource)).toBe(next);
  });

  it('collects exactly the resources left in an older generation', () => {
    const r1 = createMockResource('r1');
    const r2 = createMockResource('r2');

    ledger.register(r1);
    generation = createGenerationToken();
    ledger.register(r2);

    const released = ledger.collect();

    expect(released).toBe(1);
    expect(r1.dispose).toHaveBeenCalledTimes(1);
    expect(r2.dispose).not.toHaveBeenCalled();
    expect(ledger.has(r1)).toBe(false);
    expect(ledger.has(r2)).toBe(true);
    expect(ledger.getHandle(r1)).toBe(null);
  });

  it('collects nothing when every resource is current', () => {
    const r = createMockResource('r');
    ledger.register(r);

    expect(ledger.collect()).toBe(0);
    expect(r.dispose).not.toHaveBeenCalled();
    expect(ledger.size).toBe(1);
  });

  it('keeps collecting after a dispose throws and reports all failures once', () => {
    const failure = new Error('release failed');
    const a = createMockResource('a');
    const b = { dispose: vi.fn(() => { throw failure; }) };
    const c = createMockResource('c');
    const current = createMockResource('current');

    ledger.register(a);
    ledger.register(b);
    ledger.register(c);
    generation = createGenerationToken();
    ledger.register(current);

    let thrown: unknown = null;
    try {
      ledger.collect();
    } catch (error) {
      thrown = error;
    }

    expect(thrown).toBeInstanceOf(ResourceDisposalError);
    if (thrown instanceof ResourceDisposalError) {
      expect(thrown.errors).toEqual([failure]);
      expect(thrown.message).toBe('ResourceLedger: 1 resource(s) failed to dispose.');
    }
    expect(a.dispose).toHaveBeenCalledTimes(1);
    expect(b.dispose).toHaveBeenCalledTimes(1);
    expect(c.dispose).toHaveBeenCalledTimes(1);
    expect(ledger.size).toBe(1);
    expect(ledger.has(b)).toBe(false);
    expect(ledger.has(current)).toBe(true);
  });

  it('tolerates registrations made from inside dispose', () => {
    const replacement = createMockResource('replacement');
    const stale = {
      dispose: vi.fn(() => {
        ledger.register(replacement);
      }),
    };

    ledger.register(stale);
    generation = createGenerationToken();

    expect(ledger.collect()).toBe(1);
    expect(replacement.dispose).not.toHaveBeenCalled();
    expect(ledger.has(replacement)).toBe(true);
    expect(ledger.size).toBe(1);
  });

  it('clear disposes every resource regardless of generation', () => {
    const old = createMockResource('old');
    const current = createMockResource('current');

    ledger.register(old);
    generation = createGenerationToken();
    ledger.register(current);

    expect(ledger.clear()).toBe(2);
    expect(old.dispose).toHaveBeenCalledTimes(1);
    expect(current.dispose).toHaveBeenCalledTimes(1);
    expect(ledger.size).toBe(0);
  });

  it('clear aggregates failures across resources', () => {
    const first = new Error('first');
    const second = new Error('second');
    ledger.register({ dispose: () => { throw first; } });
    ledger.register({ dispose: () => { throw second; } });

    expect(() => ledger.clear()).toThrow('ResourceLedger: 2 resource(s) failed to dispose.');
    expect(ledger.size).toBe(0);
  });

  it('tracks a resource again after it was collected', () => {
    const r = createMockResource('r');
    ledger.register(r);
    generation = createGenerationToken();
    ledger.collect();

    expect(ledger.register(r)).toBe(2);
    expect(ledger.getGeneration(r)).toBe(generation);
  });
});
