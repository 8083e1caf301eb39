import type {
  CollectionChange,
  CollectionChangeListener,
  NotifyingCollection,
  Unsubscribe,
} from '../config/types';

/**
 * An array-backed collection that notifies subscribers after every mutation.
 * Bind one to a chart property and the chart redraws when its contents change.
 */
export interface ObservableCollection<T> extends NotifyingCollection<T> {
  readonly length: number;
  get(index: number): T;
  toArray(): T[];
  push(...items: T[]): void;
  insert(index: number, item: T): void;
  set(index: number, item: T): void;
  removeAt(index: number): T;
  /** Replaces the whole contents and emits a single `reset`. */
  reset(items: ReadonlyArray<T>): void;
  clear(): void;
  [Symbol.iterator](): Iterator<T>;
}

export function createObservableCollection<T>(initialItems: Iterable<T> = []): ObservableCollection<T> {
  const items: T[] = Array.from(initialItems);
  const listeners = new Set<CollectionChangeListener<T>>();

  const assertIndex = (index: number, upperBound: number): void => {
    if (!Number.isInteger(index) || index < 0 || index > upperBound) {
      throw new RangeError(`ObservableCollection: index ${index} is out of range [0, ${upperBound}].`);
    }
  };

  const emit = (change: CollectionChange<T>): void => {
    // Snapshot so listeners may unsubscribe while being notified.
    for (const listener of Array.from(listeners)) {
      listener(change);
    }
  };

  function subscribe(listener: CollectionChangeListener<T>): Unsubscribe {
    listeners.add(listener);
    return () => {
      listeners.delete(listener);
    };
  }

  function get(index: number): T {
    assertIndex(index, items.length - 1);
    return items[index];
  }

  function push(...newItems: T[]): void {
    if (newItems.length === 0) return;
    const index = items.length;
    items.push(...newItems);
    emit({ action: 'add', index, newItems, oldItems: [] });
  }

  function insert(index: number, item: T): void {
    assertIndex(index, items.length);
    items.splice(index, 0, item);
    emit({ action: 'add', index, newItems: [item], oldItems: [] });
  }

  function set(index: number, item: T): void {
    assertIndex(index, items.length - 1);
    const previous = items[index];
    items[index] = item;
    emit({ action: 'replace', index, newItems: [item], oldItems: [previous] });
  }

  function removeAt(index: number): T {
    assertIndex(index, items.length - 1);
    const [removed] = items.splice(index, 1);
    emit({ action: 'remove', index, newItems: [], oldItems: [removed] });
    return removed;
  }

  function reset(newItems: ReadonlyArray<T>): void {
    const oldItems = items.splice(0, items.length, ...newItems);
    emit({ action: 'reset', index: -1, newItems: Array.from(newItems), oldItems });
  }

  return {
    get length() {
      return items.length;
    },
    get,
    toArray: () => items.slice(),
    push,
    insert,
    set,
    removeAt,
    reset,
    clear: () => reset([]),
    subscribe,
    [Symbol.iterator]: () => items.slice()[Symbol.iterator](),
  };
}
