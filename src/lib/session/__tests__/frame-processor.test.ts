import { DeepPartial, Detection, DetectionFrame, FeederWatchConfig, LogEvent, LogRecord, PhotoRequest, TemperatureSample } from '../../../types';
import { ProcessorBusyError } from '../../errors';
import { resolveConfig } from '../../config/load-config';
import { EventLogSink } from '../../logging/event-log-sink';
import { ConsoleReporter } from '../console-reporter';
import { FrameProcessor, PhotoSink } from '../frame-processor';

// Local wall-clock base so printed times do not depend on the timezone
const BASE = new Date(2024, 0, 15, 9, 0, 0).getTime() / 1000;

class RecordingSink implements EventLogSink {
  records: LogRecord[] = [];
  events: LogEvent[] = [];
  writeRecord(record: LogRecord): void {
    this.records.push(record);
  }
  writeEvent(event: LogEvent): void {
    this.events.push(event);
  }
  writeTemperature(_sample: TemperatureSample): void {}
}

function silentLogger() {
  return { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() };
}

function bird(x = 0.5): Detection {
  return { label: 'bird', confidence: 0.8, x, y: 0.5, width: 0.1, height: 0.1 };
}

function frames(counts: number[], offsets: number[]): DetectionFrame[] {
  return counts.map((count, i) => ({
    timestamp: BASE + offsets[i],
    detections: Array.from({ length: count }, (_, j) => bird(0.1 * j))
  }));
}

function setup(mode: 'all' | 'changes_only' | 'minimal', overrides: DeepPartial<FeederWatchConfig> = {}) {
  const config = resolveConfig({
    ...overrides,
    tracking: { birdTimeoutSeconds: 30, minTimeBetweenVisitsSeconds: 10, ...overrides.tracking },
    logging: { consoleOutputMode: mode, ...overrides.logging }
  });
  const sink = new RecordingSink();
  const lines: string[] = [];
  const logger = silentLogger();
  const processor = new FrameProcessor({
    config,
    sink,
    reporter: new ConsoleReporter(mode, line => lines.push(line)),
    logger
  });
  return { processor, sink, lines, logger, config };
}

describe('FrameProcessor', () => {
  it('should count a short absence as the same visit', () => {
    const { processor, sink } = setup('minimal');

    for (const frame of frames([0, 1, 1, 0, 1], [0, 5, 6, 20, 25])) {
      processor.process(frame);
    }

    expect(processor.getStats()).toMatchObject({ totalUnique: 1, totalVisits: 1 });
    expect(sink.events).toEqual([
      { kind: 'visit', counterValue: 1, timestamp: BASE + 5 },
      { kind: 'new-unique', counterValue: 1, timestamp: BASE + 5 }
    ]);
  });

  it('should write one event per increased total', () => {
    const { processor, sink } = setup('minimal');

    for (const frame of frames([0, 1, 1, 0, 1], [0, 5, 6, 20, 31])) {
      processor.process(frame);
    }

    expect(processor.getStats()).toMatchObject({ totalUnique: 1, totalVisits: 2 });
    expect(sink.events.map(e => `${e.kind}#${e.counterValue}`)).toEqual(['visit#1', 'new-unique#1', 'visit#2']);
  });

  describe('record emission', () => {
    it('should record every frame with birds in all mode', () => {
      const { processor, sink } = setup('all');

      for (const frame of frames([0, 1, 1, 0, 1], [0, 5, 6, 20, 25])) {
        processor.process(frame);
      }

      expect(sink.records.map(r => r.timestamp - BASE)).toEqual([5, 6, 25]);
      expect(sink.records[0]).toEqual({
        timestamp: BASE + 5,
        frameCount: 1,
        activeCount: 1,
        totalUnique: 1,
        totalVisits: 1,
        detections: [bird(0)]
      });
    });

    it('should record only visit starts in minimal mode', () => {
      const { processor, sink } = setup('minimal');

      const results = frames([1, 1, 2], [0, 1, 2]).map(frame => processor.process(frame));

      expect(results.map(r => r.recordWritten)).toEqual([true, false, true]);
      expect(sink.records.map(r => r.totalVisits)).toEqual([1, 2]);
    });

    it('should not emit anything for empty frames at zero', () => {
      const { processor, sink } = setup('all');

      const result = processor.process({ timestamp: BASE, detections: [] });

      expect(result.changes).toEqual({ visits: null, unique: null });
      expect(sink.records).toHaveLength(0);
      expect(sink.events).toHaveLength(0);
    });

    it('should write nothing when the text log is disabled', () => {
      const { processor, sink } = setup('all', { logging: { enableTextLog: false } });

      processor.process({ timestamp: BASE, detections: [bird()] });

      expect(sink.records).toHaveLength(0);
      expect(sink.events).toHaveLength(0);
      expect(processor.getStats().totalVisits).toBe(1);
    });
  });

  it('should filter detections before tracking', () => {
    const { processor } = setup('minimal');

    const result = processor.process({
      timestamp: BASE,
      detections: [{ ...bird(), label: 'cat' }, { ...bird(), confidence: 0.1 }]
    });

    expect(result.update.frameCount).toBe(0);
    expect(result.stats.totalVisits).toBe(0);
  });

  it('should measure fps from consecutive frame times', () => {
    const { processor } = setup('minimal');

    processor.process({ timestamp: BASE, detections: [] });
    const result = processor.process({ timestamp: BASE + 0.5, detections: [] });

    expect(result.fps).toBe(2);
    expect(processor.getFps()).toBe(2);
  });

  describe('sink failures', () => {
    it('should keep counting when the sink throws', () => {
      const { processor, sink, logger } = setup('all');
      sink.writeRecord = () => {
        throw new Error('disk full');
      };

      const result = processor.process({ timestamp: BASE, detections: [bird()] });

      expect(result.recordWritten).toBe(false);
      expect(result.stats).toMatchObject({ totalUnique: 1, totalVisits: 1 });
      expect(sink.events).toHaveLength(2);
      expect(logger.warn).toHaveBeenCalledWith({ err: new Error('disk full'), frameNumber: 1 }, 'Failed to write record');
    });
  });

  it('should refuse overlapping calls', () => {
    const { processor, sink } = setup('all');
    let captured: unknown = null;
    sink.writeRecord = () => {
      try {
        processor.process({ timestamp: BASE + 1, detections: [] });
      } catch (error) {
        captured = error;
      }
    };

    processor.process({ timestamp: BASE, detections: [bird()] });

    expect(captured).toBeInstanceOf(ProcessorBusyError);
    expect(processor.getFrameNumber()).toBe(1);
  });

  describe('photo saving', () => {
    function withPhotos(photoSink: PhotoSink) {
      const config = resolveConfig({ frameSaving: { enablePhotoSave: true, minSaveIntervalSeconds: 5 } });
      return new FrameProcessor({
        config,
        photoSink,
        reporter: new ConsoleReporter('minimal', () => undefined),
        logger: silentLogger()
      });
    }

    it('should save at most one photo per interval', () => {
      const saved: PhotoRequest[] = [];
      const processor = withPhotos({ savePhoto: request => saved.push(request) });

      for (const frame of frames([1, 1, 0, 2, 1], [0, 2, 4, 6, 8])) {
        processor.process(frame);
      }

      expect(saved).toEqual([
        { frameNumber: 1, timestamp: BASE, birdCount: 1, photoNumber: 1 },
        { frameNumber: 4, timestamp: BASE + 6, birdCount: 2, photoNumber: 2 }
      ]);
    });

    it('should not number a photo that failed to save', () => {
      let calls = 0;
      const numbers: number[] = [];
      const processor = withPhotos({
        savePhoto: request => {
          calls++;
          if (calls === 1) throw new Error('camera busy');
          numbers.push(request.photoNumber);
        }
      });

      const results = frames([1, 1], [0, 5]).map(frame => processor.process(frame));

      expect(results.map(r => r.photoSaved)).toEqual([false, true]);
      expect(numbers).toEqual([1]);
    });
  });

  describe('console output', () => {
    it('should print every transition in all mode', () => {
      const { processor, lines } = setup('all');

      for (const frame of frames([0, 1, 1, 0, 1], [0, 5, 6, 20, 25])) {
        processor.process(frame);
      }

      expect(lines).toEqual([
        'First feeder visit #1 at 09:00:05',
        'Birds left the frame at 09:00:20',
        'Visit #1 continues (detector flicker)'
      ]);
    });

    it('should print visits and counter changes in changes_only mode', () => {
      const { processor, lines } = setup('changes_only');

      for (const frame of frames([1, 2, 0, 1], [0, 1, 2, 30])) {
        processor.process(frame);
      }

      expect(lines).toEqual([
        'First feeder visit #1 at 09:00:00',
        'CHANGE | Unique: 1 | Visits: 1',
        'Group feeder visit #2: 2 birds on frame',
        'CHANGE | Unique: 1 | Visits: 2',
        'New feeder visit #3 at 09:00:30 (28.0s since last departure)',
        'CHANGE | Unique: 1 | Visits: 3'
      ]);
    });

    it('should print a status line every 30 frames in all mode', () => {
      const { processor, lines } = setup('all');

      for (let i = 0; i < 30; i++) {
        processor.process({ timestamp: BASE + i * 0.25, detections: [] });
      }

      expect(lines).toEqual(['Frame 30 | FPS: 4.0 | Birds: 0 | Active: 0 | Unique: 0 | Visits: 0']);
    });

    it('should stay quiet in minimal mode', () => {
      const { processor, lines } = setup('minimal');

      for (const frame of frames([1, 2, 0, 1], [0, 1, 2, 30])) {
        processor.process(frame);
      }

      expect(lines).toEqual([]);
    });
  });
});
