import { HrtimeClock } from '@scheduler/infrastructure/HrtimeClock';

describe('HrtimeClock', () => {
  it('returns bigint nanoseconds from process.hrtime', () => {
    const spy = jest.spyOn(process.hrtime, 'bigint').mockReturnValue(123_456_789n);

    expect(new HrtimeClock().now()).toBe(123_456_789n);

    spy.mockRestore();
  });

  it('never goes backwards', () => {
    const clock = new HrtimeClock();
    const first = clock.now();
    const second = clock.now();

    expect(second >= first).toBe(true);
  });
});
