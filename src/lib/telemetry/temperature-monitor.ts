import { EventLogSink } from '../logging/event-log-sink';
import defaultLogger, { Logger } from '../logging/logger';
import { TemperatureReader, createThermalZoneReader } from './cpu-temperature';

export interface TemperatureMonitorOptions {
  sink: EventLogSink;
  intervalSeconds: number;
  // Read-only view of the frame loop's current FPS
  getFps: () => number;
  readTemperature?: TemperatureReader;
  now?: () => number;
  logger?: Logger;
}

/**
 * Samples CPU temperature and FPS on its own timer, independent of the frame
 * loop. The timer is unref'd so it never keeps the process alive.
 */
export class TemperatureMonitor {
  private timer: NodeJS.Timeout | null = null;
  private readTemperature: TemperatureReader;
  private now: () => number;
  private logger: Logger;

  constructor(private options: TemperatureMonitorOptions) {
    this.readTemperature = options.readTemperature ?? createThermalZoneReader();
    this.now = options.now ?? (() => Date.now() / 1000);
    this.logger = options.logger ?? defaultLogger;
  }

  async start(): Promise<void> {
    if (this.timer) return;

    // The first sample carries no FPS: no frames have been processed yet
    await this.sample(false);

    this.timer = setInterval(() => {
      this.sample(true).catch(err => this.logger.error({ err }, 'Temperature sample failed'));
    }, this.options.intervalSeconds * 1000);
    this.timer.unref();

    this.logger.info({ intervalSeconds: this.options.intervalSeconds }, 'Temperature monitoring started');
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  get running(): boolean {
    return this.timer !== null;
  }

  async sample(includeFps: boolean = true): Promise<boolean> {
    const celsius = await this.readTemperature();
    if (celsius === null) {
      this.logger.debug('CPU temperature unavailable, skipping sample');
      return false;
    }

    try {
      this.options.sink.writeTemperature({
        celsius,
        timestamp: this.now(),
        fps: includeFps ? this.options.getFps() : undefined
      });
    } catch (err) {
      this.logger.warn({ err }, 'Failed to write temperature sample');
      return false;
    }
    return true;
  }
}
