import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { LogEvent, LogRecord, TemperatureSample } from '../../../types';
import { EventLogSink } from '../../logging/event-log-sink';
import { createThermalZoneReader } from '../cpu-temperature';
import { TemperatureMonitor } from '../temperature-monitor';

class RecordingSink implements EventLogSink {
  samples: TemperatureSample[] = [];
  writeRecord(_record: LogRecord): void {}
  writeEvent(_event: LogEvent): void {}
  writeTemperature(sample: TemperatureSample): void {
    this.samples.push(sample);
  }
}

function silentLogger() {
  return { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() };
}

describe('createThermalZoneReader', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'thermal-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should convert millidegrees to one decimal', async () => {
    const zone = path.join(dir, 'temp');
    fs.writeFileSync(zone, '47312\n');

    await expect(createThermalZoneReader(zone)()).resolves.toBe(47.3);
  });

  it('should resolve to null when the zone is missing', async () => {
    await expect(createThermalZoneReader(path.join(dir, 'nope'))()).resolves.toBeNull();
  });

  it('should resolve to null for unreadable content', async () => {
    const zone = path.join(dir, 'temp');
    fs.writeFileSync(zone, 'n/a');

    await expect(createThermalZoneReader(zone)()).resolves.toBeNull();
  });
});

describe('TemperatureMonitor', () => {
  it('should write an initial sample without fps on start', async () => {
    const sink = new RecordingSink();
    const monitor = new TemperatureMonitor({
      sink,
      intervalSeconds: 300,
      getFps: () => 14,
      readTemperature: async () => 48.5,
      now: () => 1000,
      logger: silentLogger()
    });

    await monitor.start();
    monitor.stop();

    expect(sink.samples).toEqual([{ celsius: 48.5, timestamp: 1000, fps: undefined }]);
    expect(monitor.running).toBe(false);
  });

  it('should read fps from the frame loop on later samples', async () => {
    const sink = new RecordingSink();
    let fps = 0;
    const monitor = new TemperatureMonitor({
      sink,
      intervalSeconds: 60,
      getFps: () => fps,
      readTemperature: async () => 50,
      now: () => 2000,
      logger: silentLogger()
    });

    fps = 7.5;
    await expect(monitor.sample()).resolves.toBe(true);

    expect(sink.samples).toEqual([{ celsius: 50, timestamp: 2000, fps: 7.5 }]);
  });

  it('should skip the sample when no temperature is available', async () => {
    const sink = new RecordingSink();
    const monitor = new TemperatureMonitor({
      sink,
      intervalSeconds: 60,
      getFps: () => 0,
      readTemperature: async () => null,
      logger: silentLogger()
    });

    await expect(monitor.sample()).resolves.toBe(false);
    expect(sink.samples).toHaveLength(0);
  });

  it('should log and carry on when the sink fails', async () => {
    const logger = silentLogger();
    const failing: EventLogSink = {
      writeRecord: () => undefined,
      writeEvent: () => undefined,
      writeTemperature: () => {
        throw new Error('disk full');
      }
    };
    const monitor = new TemperatureMonitor({
      sink: failing,
      intervalSeconds: 60,
      getFps: () => 0,
      readTemperature: async () => 40,
      logger
    });

    await expect(monitor.sample()).resolves.toBe(false);
    expect(logger.warn).toHaveBeenCalledWith({ err: new Error('disk full') }, 'Failed to write temperature sample');
  });

  it('should sample on every interval until stopped', async () => {
    jest.useFakeTimers();
    try {
      const sink = new RecordingSink();
      const monitor = new TemperatureMonitor({
        sink,
        intervalSeconds: 60,
        getFps: () => 3,
        readTemperature: async () => 42,
        now: () => 0,
        logger: silentLogger()
      });

      await monitor.start();
      await jest.advanceTimersByTimeAsync(120_000);
      monitor.stop();
      await jest.advanceTimersByTimeAsync(60_000);

      expect(sink.samples.map(s => s.fps)).toEqual([undefined, 3, 3]);
    } finally {
      jest.useRealTimers();
    }
  });
});
