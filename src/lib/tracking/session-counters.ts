import { CounterChanges, SessionStats } from '../../types';

const EMPTY_STATS: SessionStats = {
  totalUnique: 0,
  totalVisits: 0,
  currentActive: 0,
  currentOnFrame: 0,
  lastAbsenceTime: null
};

/**
 * Session totals fed from the tracker after every frame.
 *
 * The change queries are edge-triggered: each call compares against the
 * snapshot taken by the previous call and then replaces it, so a second call
 * without an intervening `observe` reports nothing.
 */
export class SessionCounters {
  private current: SessionStats = { ...EMPTY_STATS };
  private prevTotalUnique: number = 0;
  private prevTotalVisits: number = 0;

  observe(stats: SessionStats): void {
    this.current = {
      ...stats,
      // Totals only ever move up within a session
      totalUnique: Math.max(this.current.totalUnique, stats.totalUnique),
      totalVisits: Math.max(this.current.totalVisits, stats.totalVisits)
    };
  }

  snapshot(): Readonly<SessionStats> {
    return { ...this.current };
  }

  hasChangedSinceLastCheck(): boolean {
    const changes = this.consumeChanges();
    return changes.visits !== null || changes.unique !== null;
  }

  consumeChanges(): CounterChanges {
    const { totalUnique, totalVisits } = this.current;
    const changes: CounterChanges = {
      visits: totalVisits > this.prevTotalVisits ? totalVisits : null,
      unique: totalUnique > this.prevTotalUnique ? totalUnique : null
    };

    this.prevTotalUnique = totalUnique;
    this.prevTotalVisits = totalVisits;

    return changes;
  }

  reset(): void {
    this.current = { ...EMPTY_STATS };
    this.prevTotalUnique = 0;
    this.prevTotalVisits = 0;
  }
}
