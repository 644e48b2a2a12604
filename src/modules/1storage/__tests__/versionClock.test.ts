import { VersionClock } from '../versionClock';

describe('VersionClock', () => {
  it('counts up from the start value when the clock is behind', () => {
    const clock = new VersionClock(() => 0);

    expect([clock.next(), clock.next(), clock.next()]).toEqual([1, 2, 3]);
    expect(clock.current()).toBe(3);
  });

  it('jumps to the wall clock when it is ahead', () => {
    let now = 100;
    const clock = new VersionClock(() => now);

    expect(clock.next()).toBe(100);
    expect(clock.next()).toBe(101);
    now = 500;
    expect(clock.next()).toBe(500);
  });

  it('never goes backwards when the wall clock does', () => {
    let now = 1000;
    const clock = new VersionClock(() => now);
    clock.next();
    now = 10;

    expect(clock.next()).toBe(1001);
  });
});
