import { SessionStats } from '../../../types';
import { SessionCounters } from '../session-counters';

function stats(totalUnique: number, totalVisits: number): SessionStats {
  return { totalUnique, totalVisits, currentActive: 1, currentOnFrame: 1, lastAbsenceTime: null };
}

describe('SessionCounters', () => {
  it('should report a change exactly once per increase', () => {
    const counters = new SessionCounters();
    counters.observe(stats(1, 1));

    expect(counters.hasChangedSinceLastCheck()).toBe(true);
    expect(counters.hasChangedSinceLastCheck()).toBe(false);
  });

  it('should report no change before anything is observed', () => {
    expect(new SessionCounters().hasChangedSinceLastCheck()).toBe(false);
  });

  it('should report no change when an observation repeats the totals', () => {
    const counters = new SessionCounters();
    counters.observe(stats(1, 2));
    counters.hasChangedSinceLastCheck();

    counters.observe(stats(1, 2));

    expect(counters.hasChangedSinceLastCheck()).toBe(false);
  });

  it('should name which totals increased', () => {
    const counters = new SessionCounters();
    counters.observe(stats(1, 1));
    counters.consumeChanges();

    counters.observe(stats(1, 3));

    expect(counters.consumeChanges()).toEqual({ visits: 3, unique: null });
    expect(counters.consumeChanges()).toEqual({ visits: null, unique: null });
  });

  it('should report both totals when both increased', () => {
    const counters = new SessionCounters();
    counters.observe(stats(2, 5));

    expect(counters.consumeChanges()).toEqual({ visits: 5, unique: 2 });
  });

  it('should never let totals go down', () => {
    const counters = new SessionCounters();
    counters.observe(stats(3, 4));

    counters.observe({ ...stats(1, 2), currentActive: 0 });

    expect(counters.snapshot()).toMatchObject({ totalUnique: 3, totalVisits: 4, currentActive: 0 });
  });

  it('should hand out copies of the snapshot', () => {
    const counters = new SessionCounters();
    counters.observe(stats(1, 1));

    const snapshot = counters.snapshot();
    counters.observe(stats(2, 2));

    expect(snapshot.totalUnique).toBe(1);
  });
});
