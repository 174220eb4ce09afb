export type EventConfig = {
  /** Capacity given to events created without one; null means unlimited. */
  defaultCapacity: number | null;
  pageSize: number;
};
