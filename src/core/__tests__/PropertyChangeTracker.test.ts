/**
 * Tests for bound-property subscription management.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { createPropertyChangeTracker, isNotifyingCollection } from '../PropertyChangeTracker';
import type { PropertyChangeTracker } from '../PropertyChangeTracker';
import type { CollectionChange, CollectionChangeListener } from '../../config/types';

const change: CollectionChange = { action: 'add', index: 0, newItems: [1], oldItems: [] };

/**
 * A notifying collection that exposes its listener set and delivers changes to a
 * snapshot of it, like most event emitters.
 */
function createFakeCollection() {
  const listeners = new Set<CollectionChangeListener>();
  return {
    listeners,
    subscribe: vi.fn((listener: CollectionChangeListener) => {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    }),
    emit(c: CollectionChange = change): void {
      for (const listener of Array.from(listeners)) listener(c);
    },
  };
}

describe('PropertyChangeTracker', () => {
  let onChange: ReturnType<typeof vi.fn>;
  let tracker: PropertyChangeTracker;

  beforeEach(() => {
    onChange = vi.fn();
    tracker = createPropertyChangeTracker({ onChange });
  });

  it('forwards mutations of the bound collection', () => {
    const values = createFakeCollection();
    tracker.onBoundPropertyChanged('values', values);

    values.emit();

    expect(onChange).toHaveBeenCalledTimes(1);
    expect(onChange).toHaveBeenCalledWith('values', change);
  });

  it('leaves one subscription after two swaps', () => {
    const a = createFakeCollection();
    const b = createFakeCollection();
    const c = createFakeCollection();

    tracker.onBoundPropertyChanged('values', a);
    tracker.onBoundPropertyChanged('values', b);
    tracker.onBoundPropertyChanged('values', c);

    expect(a.listeners.size).toBe(0);
    expect(b.listeners.size).toBe(0);
    expect(c.listeners.size).toBe(1);
    expect(tracker.activeSubscriptionCount()).toBe(1);
    expect(tracker.getReference('values')).toBe(c);

    a.emit();
    b.emit();
    expect(onChange).not.toHaveBeenCalled();

    c.emit();
    expect(onChange).toHaveBeenCalledTimes(1);
  });

  it('records instances that cannot notify and still releases the previous one', () => {
    const a = createFakeCollection();
    const plain = [1, 2, 3];

    tracker.onBoundPropertyChanged('values', a);
    tracker.onBoundPropertyChanged('values', plain);

    expect(a.listeners.size).toBe(0);
    expect(tracker.activeSubscriptionCount()).toBe(0);
    expect(tracker.getReference('values')).toBe(plain);
    expect(tracker.hasReference('values')).toBe(true);
  });

  it('re-binding the same instance keeps a single subscription', () => {
    const a = createFakeCollection();

    tracker.onBoundPropertyChanged('values', a);
    tracker.onBoundPropertyChanged('values', a);

    expect(a.listeners.size).toBe(1);
    a.emit();
    expect(onChange).toHaveBeenCalledTimes(1);
  });

  it('tracks properties independently', () => {
    const values = createFakeCollection();
    const series = createFakeCollection();

    tracker.onBoundPropertyChanged('values', values);
    tracker.onBoundPropertyChanged('series', series);
    tracker.onBoundPropertyChanged('values', null);

    expect(tracker.activeSubscriptionCount()).toBe(1);
    series.emit();
    expect(onChange).toHaveBeenCalledWith('series', change);
  });

  it('ignores a change delivered after the instance was swapped out', () => {
    const a = createFakeCollection();
    tracker.onBoundPropertyChanged('values', a);
    const [staleListener] = Array.from(a.listeners);

    tracker.onBoundPropertyChanged('values', createFakeCollection());
    staleListener(change);

    expect(onChange).not.toHaveBeenCalled();
  });

  it('dispose releases every subscription and ignores later swaps', () => {
    const values = createFakeCollection();
    const series = createFakeCollection();
    tracker.onBoundPropertyChanged('values', values);
    tracker.onBoundPropertyChanged('series', series);

    tracker.dispose();

    expect(values.listeners.size).toBe(0);
    expect(series.listeners.size).toBe(0);
    expect(tracker.activeSubscriptionCount()).toBe(0);
    expect(tracker.hasReference('values')).toBe(false);

    const late = createFakeCollection();
    tracker.onBoundPropertyChanged('values', late);
    expect(late.subscribe).not.toHaveBeenCalled();
    expect(tracker.hasReference('values')).toBe(false);
  });

  it('dispose is idempotent', () => {
    tracker.onBoundPropertyChanged('values', createFakeCollection());
    tracker.dispose();
    expect(() => tracker.dispose()).not.toThrow();
  });
});

describe('isNotifyingCollection', () => {
  it('recognises objects with a subscribe function', () => {
    expect(isNotifyingCollection({ subscribe: () => () => undefined })).toBe(true);
    expect(isNotifyingCollection({ subscribe: 1 })).toBe(false);
    expect(isNotifyingCollection([1, 2])).toBe(false);
    expect(isNotifyingCollection(null)).toBe(false);
    expect(isNotifyingCollection('subscribe')).toBe(false);
  });
});
