import { InvalidDurationError } from '@shared/kernel/DomainError';

const NANOS_PER_MILLI = 1_000_000n;
const NANOS_PER_SECOND = 1_000_000_000n;

export interface DurationParts {
  seconds?: number;
  millis?: number;
  nanos?: number | bigint;
}

/**
 * Non-negative span of time held as an integral nanosecond count.
 * Fractional inputs are rounded to the nearest nanosecond.
 */
export class Duration {
  private constructor(private readonly nanos: bigint) {
    if (nanos < 0n) throw new InvalidDurationError('Must be non-negative');
  }

  static fromNanos(nanos: number | bigint): Duration {
    if (typeof nanos === 'bigint') return new Duration(nanos);
    return new Duration(toScaledBigInt(nanos, 1n));
  }

  static fromMillis(millis: number): Duration {
    return new Duration(toScaledBigInt(millis, NANOS_PER_MILLI));
  }

  static fromSeconds(seconds: number): Duration {
    return new Duration(toScaledBigInt(seconds, NANOS_PER_SECOND));
  }

  static of(parts: DurationParts): Duration {
    let total = 0n;
    if (parts.seconds !== undefined) total += Duration.fromSeconds(parts.seconds).nanos;
    if (parts.millis !== undefined) total += Duration.fromMillis(parts.millis).nanos;
    if (parts.nanos !== undefined) total += Duration.fromNanos(parts.nanos).nanos;
    return new Duration(total);
  }

  static zero(): Duration {
    return new Duration(0n);
  }

  isZero(): boolean {
    return this.nanos === 0n;
  }

  toNanos(): bigint {
    return this.nanos;
  }

  toMillis(): number {
    return Number(this.nanos) / Number(NANOS_PER_MILLI);
  }

  equals(other: Duration): boolean {
    return this.nanos === other.nanos;
  }
}

function toScaledBigInt(value: number, nanosPerUnit: bigint): bigint {
  if (!Number.isFinite(value)) throw new InvalidDurationError('Must be finite');
  if (value < 0) throw new InvalidDurationError('Must be non-negative');
  if (Number.isInteger(value)) return BigInt(value) * nanosPerUnit;
  return BigInt(Math.round(value * Number(nanosPerUnit)));
}
