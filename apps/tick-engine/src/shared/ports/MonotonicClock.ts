/**
 * Source of monotonic timestamps in integral nanoseconds.
 *
 * The epoch is arbitrary; only differences between readings are
 * meaningful. Implementations must never go backwards.
 */
export interface MonotonicClock {
  now(): bigint;
}
