import { Detection, IdentitySlot, PresenceUpdate, SessionStats, TrackingConfig } from '../../types';
import { TrackerInputError } from '../errors';
import { VisitDetector } from './visit-detector';
import { SingleSlotMatcher, SlotMatcher } from './slot-matcher';

export class PresenceTracker {
  private activeSlots: Map<string, IdentitySlot> = new Map();
  private totalUnique: number = 0;
  private currentOnFrame: number = 0;
  private lastUpdateTime: number | null = null;
  private visitDetector: VisitDetector;
  private matcher: SlotMatcher;
  private enableTracking: boolean;
  private birdTimeout: number;

  constructor(config: Partial<TrackingConfig> = {}, matcher: SlotMatcher = new SingleSlotMatcher()) {
    this.enableTracking = config.enableTracking ?? true;
    this.birdTimeout = config.birdTimeoutSeconds ?? 30;
    this.visitDetector = new VisitDetector({
      enabled: config.enableVisitCounter ?? true,
      minTimeBetweenVisits: config.minTimeBetweenVisitsSeconds ?? 10
    });
    this.matcher = matcher;
  }

  /**
   * Feed one frame of already-filtered detections.
   *
   * `now` must not go backwards between calls. Invalid input is rejected
   * before any counter moves.
   */
  update(detections: Detection[], now: number): PresenceUpdate {
    this.validate(detections, now);
    this.lastUpdateTime = now;

    const frameCount = detections.length;
    const visit = this.visitDetector.update(frameCount, now);
    this.currentOnFrame = frameCount;

    if (!this.enableTracking) {
      return { frameCount, newUniqueCount: 0, visit };
    }

    this.expireSlots(now);

    let newUniqueCount = 0;
    const assignments = this.matcher.match(detections, this.getActiveSlots());

    for (const assignment of assignments) {
      if (assignment.kind === 'promote') {
        this.totalUnique++;
        const id = `bird_${this.totalUnique}`;
        this.activeSlots.set(id, { id, lastSeen: now });
        newUniqueCount++;
      } else if (assignment.kind === 'refresh') {
        const slot = this.activeSlots.get(assignment.slotId);
        if (slot) {
          slot.lastSeen = now;
        }
      }
    }

    return { frameCount, newUniqueCount, visit };
  }

  private expireSlots(now: number): void {
    for (const [id, slot] of this.activeSlots) {
      if (now - slot.lastSeen > this.birdTimeout) {
        this.activeSlots.delete(id);
      }
    }
  }

  private validate(detections: Detection[], now: number): void {
    if (!Number.isFinite(now)) {
      throw new TrackerInputError(`Frame timestamp must be a finite number, got ${now}`);
    }
    if (this.lastUpdateTime !== null && now < this.lastUpdateTime) {
      throw new TrackerInputError(
        `Frame timestamp ${now} is earlier than the previous frame (${this.lastUpdateTime})`
      );
    }

    detections.forEach((det, index) => {
      const values = [det.confidence, det.x, det.y, det.width, det.height];
      if (values.some(v => !Number.isFinite(v))) {
        throw new TrackerInputError(`Detection ${index} has a non-numeric confidence or box value`);
      }
    });
  }

  getActiveSlots(): IdentitySlot[] {
    return Array.from(this.activeSlots.values(), slot => ({ ...slot }));
  }

  getStats(): SessionStats {
    return {
      totalUnique: this.totalUnique,
      totalVisits: this.visitDetector.totalVisits,
      currentActive: this.activeSlots.size,
      currentOnFrame: this.currentOnFrame,
      lastAbsenceTime: this.visitDetector.lastAbsenceTime
    };
  }

  reset(): void {
    this.activeSlots.clear();
    this.totalUnique = 0;
    this.currentOnFrame = 0;
    this.lastUpdateTime = null;
    this.visitDetector.reset();
  }
}
