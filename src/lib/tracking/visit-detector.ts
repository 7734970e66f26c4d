import { VisitState, VisitUpdate } from '../../types';

export interface VisitDetectorParams {
  enabled: boolean;
  minTimeBetweenVisits: number; // seconds
}

/**
 * Decides when a burst of presence at the feeder counts as a new visit.
 *
 * Detector output flickers: a bird that drops out for a frame or two should
 * not produce a second visit, so a reappearance only counts once the feeder
 * has been empty for at least `minTimeBetweenVisits`. A frame with more birds
 * than the previous one (when there was already at least one) counts as an
 * additional visit, so 1 -> 2 -> 3 yields two extra visits.
 */
export class VisitDetector {
  private state: VisitState = {
    lastFrameCount: 0,
    lastAbsenceTime: null,
    totalVisits: 0
  };
  private params: VisitDetectorParams;

  constructor(params: Partial<VisitDetectorParams> = {}) {
    this.params = {
      enabled: params.enabled ?? true,
      minTimeBetweenVisits: params.minTimeBetweenVisits ?? 10
    };
  }

  update(frameCount: number, now: number): VisitUpdate {
    if (!this.params.enabled) {
      return { visitStarted: false, transition: 'none', totalVisits: this.state.totalVisits };
    }

    const previous = this.state.lastFrameCount;
    let result: VisitUpdate = { visitStarted: false, transition: 'none', totalVisits: this.state.totalVisits };

    if (frameCount > 0) {
      if (previous === 0) {
        if (this.state.lastAbsenceTime === null) {
          result = this.startVisit('first-visit');
        } else {
          const gap = now - this.state.lastAbsenceTime;
          if (gap >= this.params.minTimeBetweenVisits) {
            result = { ...this.startVisit('new-visit'), secondsSinceAbsence: gap };
          } else {
            result = {
              visitStarted: false,
              transition: 'continuation',
              totalVisits: this.state.totalVisits,
              secondsSinceAbsence: gap
            };
          }
        }
      } else if (frameCount > previous && frameCount > 1) {
        result = this.startVisit('group-growth');
      }
    } else if (previous > 0) {
      this.state.lastAbsenceTime = now;
      result = { visitStarted: false, transition: 'departure', totalVisits: this.state.totalVisits };
    }

    this.state.lastFrameCount = frameCount;
    return result;
  }

  private startVisit(transition: 'first-visit' | 'new-visit' | 'group-growth'): VisitUpdate {
    this.state.totalVisits++;
    return { visitStarted: true, transition, totalVisits: this.state.totalVisits };
  }

  get totalVisits(): number {
    return this.state.totalVisits;
  }

  get lastAbsenceTime(): number | null {
    return this.state.lastAbsenceTime;
  }

  getState(): VisitState {
    return { ...this.state };
  }

  reset(): void {
    this.state = { lastFrameCount: 0, lastAbsenceTime: null, totalVisits: 0 };
  }
}
