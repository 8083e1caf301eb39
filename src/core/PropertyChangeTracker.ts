/**
 * Keeps one change subscription per bound chart property.
 *
 * When the view swaps the collection instance bound to a property, the
 * subscription on the previous instance is released before the new instance is
 * observed, so repeated swaps never accumulate handlers.
 *
 * @module PropertyChangeTracker
 */

import type { CollectionChange, NotifyingCollection, Unsubscribe } from '../config/types';

export interface PropertyChangeTrackerConfig {
  /** Called on every mutation reported by a currently bound instance. */
  readonly onChange: (propertyName: string, change: CollectionChange) => void;
}

export interface PropertyChangeTracker {
  /**
   * Records `instance` as the current value of `propertyName`, moving the change
   * subscription from the previous instance to it. Instances that cannot notify
   * are still recorded.
   */
  onBoundPropertyChanged(propertyName: string, instance: unknown): void;
  getReference(propertyName: string): unknown;
  hasReference(propertyName: string): boolean;
  activeSubscriptionCount(): number;
  /** Releases every subscription. Later swaps and notifications are ignored. */
  dispose(): void;
}

export const isNotifyingCollection = (value: unknown): value is NotifyingCollection => {
  if (value === null || (typeof value !== 'object' && typeof value !== 'function')) return false;
  return 'subscribe' in value && typeof value.subscribe === 'function';
};

export function createPropertyChangeTracker(config: PropertyChangeTrackerConfig): PropertyChangeTracker {
  const { onChange } = config;

  const references = new Map<string, unknown>();
  const subscriptions = new Map<string, Unsubscribe>();
  let disposed = false;

  const unsubscribe = (propertyName: string): void => {
    const release = subscriptions.get(propertyName);
    if (!release) return;
    subscriptions.delete(propertyName);
    release();
  };

  const subscribe = (propertyName: string, instance: NotifyingCollection): void => {
    // A collection may still deliver a change it had already started emitting.
    let active = true;
    const release = instance.subscribe((change) => {
      if (!active || disposed) return;
      onChange(propertyName, change);
    });
    subscriptions.set(propertyName, () => {
      active = false;
      release();
    });
  };

  function onBoundPropertyChanged(propertyName: string, instance: unknown): void {
    if (disposed) return;

    unsubscribe(propertyName);
    if (isNotifyingCollection(instance)) {
      subscribe(propertyName, instance);
    }
    references.set(propertyName, instance);
  }

  function dispose(): void {
    if (disposed) return;
    disposed = true;

    for (const propertyName of Array.from(subscriptions.keys())) {
      unsubscribe(propertyName);
    }
    references.clear();
  }

  return {
    onBoundPropertyChanged,
    getReference: (propertyName) => references.get(propertyName),
    hasReference: (propertyName) => references.has(propertyName),
    activeSubscriptionCount: () => subscriptions.size,
    dispose,
  };
}
