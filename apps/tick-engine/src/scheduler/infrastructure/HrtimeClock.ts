import { MonotonicClock } from '@shared/ports/MonotonicClock';

export class HrtimeClock implements MonotonicClock {
  now(): bigint {
    return process.hrtime.bigint();
  }
}
