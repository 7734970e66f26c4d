import { format } from 'date-fns';
import { ConsoleOutputMode, CounterChanges, SessionStats, VisitUpdate } from '../../types';
import { shouldPrintChanges, shouldPrintStatus, shouldPrintTransition } from '../logging/emission-policy';

function clock(seconds: number): string {
  return format(new Date(seconds * 1000), 'HH:mm:ss');
}

export class ConsoleReporter {
  constructor(
    private mode: ConsoleOutputMode,
    private print: (line: string) => void = line => console.log(line)
  ) {}

  reportVisit(visit: VisitUpdate, birdsOnFrame: number, now: number): void {
    if (!shouldPrintTransition(this.mode, visit.transition)) return;

    switch (visit.transition) {
      case 'first-visit':
        this.print(`First feeder visit #${visit.totalVisits} at ${clock(now)}`);
        break;
      case 'new-visit':
        this.print(
          `New feeder visit #${visit.totalVisits} at ${clock(now)} (${(visit.secondsSinceAbsence ?? 0).toFixed(1)}s since last departure)`
        );
        break;
      case 'group-growth':
        this.print(`Group feeder visit #${visit.totalVisits}: ${birdsOnFrame} birds on frame`);
        break;
      case 'continuation':
        this.print(`Visit #${visit.totalVisits} continues (detector flicker)`);
        break;
      case 'departure':
        this.print(`Birds left the frame at ${clock(now)}`);
        break;
    }
  }

  reportFrame(frameNumber: number, fps: number, stats: SessionStats, changes: CounterChanges): void {
    if (shouldPrintStatus(this.mode, frameNumber)) {
      this.print(
        `Frame ${frameNumber} | FPS: ${fps.toFixed(1)} | Birds: ${stats.currentOnFrame} | ` +
          `Active: ${stats.currentActive} | Unique: ${stats.totalUnique} | Visits: ${stats.totalVisits}`
      );
    }

    if (shouldPrintChanges(this.mode) && (changes.visits !== null || changes.unique !== null)) {
      this.print(`CHANGE | Unique: ${stats.totalUnique} | Visits: ${stats.totalVisits}`);
    }
  }
}
