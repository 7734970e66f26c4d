import { LogEvent, LogRecord, TemperatureSample } from '../../types';

/**
 * Destination for session log output. Implementations may block briefly or
 * buffer; callers treat a throw as non-fatal.
 */
export interface EventLogSink {
  writeRecord(record: LogRecord): void;
  writeEvent(event: LogEvent): void;
  writeTemperature(sample: TemperatureSample): void;
}

export class NullLogSink implements EventLogSink {
  writeRecord(): void {}
  writeEvent(): void {}
  writeTemperature(): void {}
}
