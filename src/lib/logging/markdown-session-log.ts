import fs from 'node:fs';
import path from 'node:path';
import { format } from 'date-fns';
import { Detection, FeederWatchConfig, LogEvent, LogEventKind, LogRecord, TemperatureSample } from '../../types';
import { EventLogSink } from './event-log-sink';

export const SESSION_TIMESTAMP_FORMAT = 'yyyy-MM-dd_HH-mm-ss';
const DATE_TIME_FORMAT = 'yyyy-MM-dd HH:mm:ss';
const TIME_FORMAT = 'HH:mm:ss';

const TOTAL_UNIQUE_LABEL = '**Total unique birds:**';
const TOTAL_UNIQUE_PATTERN = /^\*\*Total unique birds:\*\* \d+$/m;

const EVENT_LABELS: Record<LogEventKind, string> = {
  visit: 'Feeder visit',
  'new-unique': 'New unique bird'
};

export interface SessionLogPaths {
  sessionDir: string;
  addLogsDir: string;
  primaryLog: string;
  legacyLog: string;
  eventsLog: string;
  temperatureLog: string | null;
}

export interface MarkdownSessionLogOptions {
  config: FeederWatchConfig;
  startedAt?: Date;
}

function toDate(seconds: number): Date {
  return new Date(seconds * 1000);
}

export function formatCoordinates(detections: Detection[]): string {
  return detections
    .map(det => `${det.label}: (${det.x.toFixed(2)},${det.y.toFixed(2)})`)
    .join('; ');
}

export function formatTemperatureRow(sample: TemperatureSample): string {
  const time = format(toDate(sample.timestamp), TIME_FORMAT);
  const fps = sample.fps !== undefined && sample.fps > 0 ? sample.fps.toFixed(1) : '-';
  return `| ${time.padEnd(16)}| ${sample.celsius.toFixed(1).padEnd(21)}| ${fps.padEnd(9)}|\n`;
}

/**
 * Markdown logs for one session, laid out as
 *
 *   <logsPath>/logs_<timestamp>/
 *     <primary table>
 *     <temperature table>
 *     add_logs/bird_counter_log.md
 *     add_logs/bird_counter_events_<timestamp>.md
 *
 * Every write is a synchronous append. At feeder frame rates that costs less
 * than a queue would, but a slow disk stalls the frame loop.
 */
export class MarkdownSessionLog implements EventLogSink {
  readonly paths: SessionLogPaths;
  private config: FeederWatchConfig;
  private startedAt: Date;
  // Running total last written into each table header, by file
  private writtenTotals: Map<string, number> = new Map();

  constructor({ config, startedAt = new Date() }: MarkdownSessionLogOptions) {
    this.config = config;
    this.startedAt = startedAt;

    const stamp = format(startedAt, SESSION_TIMESTAMP_FORMAT);
    const sessionDir = path.join(config.logging.logsPath, `logs_${stamp}`);
    const addLogsDir = path.join(sessionDir, 'add_logs');

    this.paths = {
      sessionDir,
      addLogsDir,
      primaryLog: path.join(sessionDir, config.logging.logFilenamePattern.replace('{timestamp}', stamp)),
      legacyLog: path.join(addLogsDir, 'bird_counter_log.md'),
      eventsLog: path.join(addLogsDir, `bird_counter_events_${stamp}.md`),
      temperatureLog: config.systemMonitoring.enableTemperatureLogging
        ? path.join(sessionDir, config.systemMonitoring.temperatureLogFilename.replace('{timestamp}', stamp))
        : null
    };

    fs.mkdirSync(addLogsDir, { recursive: true });
    this.initPrimaryLog();
    this.initLegacyLog();
    this.initEventsLog();
    this.initTemperatureLog();
  }

  private initPrimaryLog(): void {
    this.writtenTotals.set(this.paths.primaryLog, 0);
    fs.writeFileSync(
      this.paths.primaryLog,
      [
        '# Bird detection log\n\n',
        `**Started:** ${format(this.startedAt, DATE_TIME_FORMAT)}\n`,
        `${TOTAL_UNIQUE_LABEL} 0\n\n`,
        '## Detections\n\n',
        '| Time | Birds on frame | Active | Unique | Visits | Coordinates |\n',
        '|------|----------------|--------|--------|--------|-------------|\n'
      ].join(''),
      'utf-8'
    );
  }

  private initLegacyLog(): void {
    this.writtenTotals.set(this.paths.legacyLog, 0);
    fs.writeFileSync(
      this.paths.legacyLog,
      [
        '# Feeder bird counter log\n\n',
        `**Started:** ${format(this.startedAt, DATE_TIME_FORMAT)}\n`,
        `${TOTAL_UNIQUE_LABEL} 0\n\n`,
        '## Frames\n\n',
        '| Time | Birds on frame | Total unique | Detection coordinates |\n',
        '|------|----------------|--------------|-----------------------|\n'
      ].join(''),
      'utf-8'
    );
  }

  private initEventsLog(): void {
    fs.writeFileSync(
      this.paths.eventsLog,
      `# Bird counter events\n\n**Started:** ${format(this.startedAt, DATE_TIME_FORMAT)}\n\n## Events\n\n`,
      'utf-8'
    );
  }

  private initTemperatureLog(): void {
    if (!this.paths.temperatureLog) return;

    const { detection, logging, frameSaving, tracking, systemMonitoring } = this.config;
    const intervalSeconds = systemMonitoring.temperatureLogIntervalMinutes * 60;

    fs.writeFileSync(
      this.paths.temperatureLog,
      [
        '# CPU temperature and system parameters\n\n',
        `**Started:** ${format(this.startedAt, DATE_TIME_FORMAT)}\n`,
        `**Interval:** every ${intervalSeconds} seconds\n\n`,
        '## System parameters\n\n',
        `- **Detection:** classes [${detection.targetClasses.join(', ')}], confidence ${detection.minConfidence}\n`,
        `- **Console:** mode ${logging.consoleOutputMode.toUpperCase()}\n`,
        `- **Photo saving:** ${frameSaving.enablePhotoSave ? 'ON' : 'OFF'}\n`,
        `- **Tracking:** timeout ${tracking.birdTimeoutSeconds}s\n`,
        `- **Visits:** min interval ${tracking.minTimeBetweenVisitsSeconds}s\n\n`,
        '## CPU temperature\n\n',
        '| Time           | Temperature (°C)    | FPS     |\n',
        '|----------------|---------------------|---------|\n'
      ].join(''),
      'utf-8'
    );
  }

  writeRecord(record: LogRecord): void {
    const time = format(toDate(record.timestamp), TIME_FORMAT);
    const coords = formatCoordinates(record.detections);

    this.updateTotalUnique(this.paths.primaryLog, record.totalUnique);
    fs.appendFileSync(
      this.paths.primaryLog,
      `| ${time} | ${record.frameCount} | ${record.activeCount} | ${record.totalUnique} | ${record.totalVisits} | ${coords} |\n`,
      'utf-8'
    );

    if (record.detections.length > 0) {
      this.updateTotalUnique(this.paths.legacyLog, record.totalUnique);
      fs.appendFileSync(
        this.paths.legacyLog,
        `| ${time} | ${record.frameCount} | ${record.totalUnique} | ${coords} |\n`,
        'utf-8'
      );
    }
  }

  writeEvent(event: LogEvent): void {
    const time = format(toDate(event.timestamp), TIME_FORMAT);
    fs.appendFileSync(
      this.paths.eventsLog,
      `- **${time}**: ${EVENT_LABELS[event.kind]} #${event.counterValue}\n`,
      'utf-8'
    );
  }

  writeTemperature(sample: TemperatureSample): void {
    if (!this.paths.temperatureLog) return;
    fs.appendFileSync(this.paths.temperatureLog, formatTemperatureRow(sample), 'utf-8');
  }

  private updateTotalUnique(filePath: string, totalUnique: number): void {
    if (this.writtenTotals.get(filePath) === totalUnique) return;
    this.writtenTotals.set(filePath, totalUnique);

    const content = fs.readFileSync(filePath, 'utf-8');
    const updated = content.replace(TOTAL_UNIQUE_PATTERN, `${TOTAL_UNIQUE_LABEL} ${totalUnique}`);
    if (updated !== content) {
      fs.writeFileSync(filePath, updated, 'utf-8');
    }
  }
}
