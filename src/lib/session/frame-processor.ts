import { DetectionFrame, FeederWatchConfig, FrameResult, PhotoRequest, SessionStats } from '../../types';
import { ProcessorBusyError } from '../errors';
import { DetectionFilter } from '../detection/detection-filter';
import { PresenceTracker } from '../tracking/presence-tracker';
import { SessionCounters } from '../tracking/session-counters';
import { SlotMatcher } from '../tracking/slot-matcher';
import { EventLogSink, NullLogSink } from '../logging/event-log-sink';
import { shouldWriteRecord } from '../logging/emission-policy';
import defaultLogger, { Logger } from '../logging/logger';
import { ConsoleReporter } from './console-reporter';

/**
 * Receives frames worth keeping as photos. Encoding and storage live outside
 * this package.
 */
export interface PhotoSink {
  savePhoto(request: PhotoRequest): void;
}

export interface FrameProcessorOptions {
  config: FeederWatchConfig;
  sink?: EventLogSink;
  photoSink?: PhotoSink;
  reporter?: ConsoleReporter;
  matcher?: SlotMatcher;
  logger?: Logger;
}

/**
 * Drives one session: filters each frame, updates the tracker, and fans the
 * result out to the log sink, photo sink and console.
 *
 * Sink failures are logged and swallowed; the in-memory counters stay
 * authoritative. Calls must not overlap.
 */
export class FrameProcessor {
  private filter: DetectionFilter;
  private tracker: PresenceTracker;
  private counters: SessionCounters = new SessionCounters();
  private sink: EventLogSink;
  private photoSink?: PhotoSink;
  private reporter: ConsoleReporter;
  private logger: Logger;
  private config: FeederWatchConfig;

  private frameNumber: number = 0;
  private fps: number = 0;
  private lastFrameTime: number | null = null;
  private lastSaveTime: number | null = null;
  private photoCount: number = 0;
  private busy: boolean = false;

  constructor(options: FrameProcessorOptions) {
    this.config = options.config;
    this.filter = new DetectionFilter(options.config.detection);
    this.tracker = new PresenceTracker(options.config.tracking, options.matcher);
    this.sink = options.config.logging.enableTextLog ? options.sink ?? new NullLogSink() : new NullLogSink();
    this.photoSink = options.photoSink;
    this.reporter = options.reporter ?? new ConsoleReporter(options.config.logging.consoleOutputMode);
    this.logger = options.logger ?? defaultLogger;
  }

  process(frame: DetectionFrame): FrameResult {
    if (this.busy) {
      throw new ProcessorBusyError();
    }
    this.busy = true;
    try {
      return this.processFrame(frame);
    } finally {
      this.busy = false;
    }
  }

  private processFrame(frame: DetectionFrame): FrameResult {
    const now = frame.timestamp;
    const detections = this.filter.apply(frame.detections);

    // Tracker rejects bad input before anything below runs
    const update = this.tracker.update(detections, now);

    this.frameNumber++;
    if (this.lastFrameTime !== null && now - this.lastFrameTime > 0) {
      this.fps = 1 / (now - this.lastFrameTime);
    }
    this.lastFrameTime = now;

    this.counters.observe(this.tracker.getStats());
    const stats = this.counters.snapshot();
    const mode = this.config.logging.consoleOutputMode;

    this.reporter.reportVisit(update.visit, update.frameCount, now);

    let recordWritten = false;
    if (shouldWriteRecord(mode, { hasDetections: detections.length > 0, visitStarted: update.visit.visitStarted })) {
      recordWritten = this.safeWrite('record', () =>
        this.sink.writeRecord({
          timestamp: now,
          frameCount: update.frameCount,
          activeCount: stats.currentActive,
          totalUnique: stats.totalUnique,
          totalVisits: stats.totalVisits,
          detections
        })
      );
    }

    const changes = this.counters.consumeChanges();
    const { visits, unique } = changes;
    if (visits !== null) {
      this.safeWrite('visit event', () => this.sink.writeEvent({ kind: 'visit', counterValue: visits, timestamp: now }));
    }
    if (unique !== null) {
      this.safeWrite('unique event', () =>
        this.sink.writeEvent({ kind: 'new-unique', counterValue: unique, timestamp: now })
      );
    }

    const photoSaved = this.maybeSavePhoto(update.frameCount, now);
    this.reporter.reportFrame(this.frameNumber, this.fps, stats, changes);

    return {
      frameNumber: this.frameNumber,
      fps: this.fps,
      update,
      stats,
      changes,
      recordWritten,
      photoSaved
    };
  }

  private maybeSavePhoto(birdCount: number, now: number): boolean {
    const { enablePhotoSave, minSaveIntervalSeconds } = this.config.frameSaving;
    if (!enablePhotoSave || !this.photoSink || birdCount === 0) return false;
    if (this.lastSaveTime !== null && now - this.lastSaveTime < minSaveIntervalSeconds) return false;

    // lastSaveTime advances even when the save fails
    this.lastSaveTime = now;
    const photoNumber = this.photoCount + 1;
    try {
      this.photoSink.savePhoto({ frameNumber: this.frameNumber, timestamp: now, birdCount, photoNumber });
    } catch (err) {
      this.logger.warn({ err, frameNumber: this.frameNumber }, 'Failed to save photo');
      return false;
    }
    this.photoCount = photoNumber;
    return true;
  }

  private safeWrite(what: string, write: () => void): boolean {
    try {
      write();
      return true;
    } catch (err) {
      this.logger.warn({ err, frameNumber: this.frameNumber }, `Failed to write ${what}`);
      return false;
    }
  }

  getFps(): number {
    return this.fps;
  }

  getFrameNumber(): number {
    return this.frameNumber;
  }

  getStats(): SessionStats {
    return this.counters.snapshot();
  }
}
