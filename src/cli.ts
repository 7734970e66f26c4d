#!/usr/bin/env node
import { parseArgs } from 'node:util';
import { FeederWatchConfig } from './types';
import { ConfigError, TrackerInputError } from './lib/errors';
import { loadConfig, resolveConfig } from './lib/config/load-config';
import { isConsoleOutputMode } from './lib/logging/emission-policy';
import { JsonlDetectionSource } from './lib/detection/frame-source';
import { MarkdownSessionLog } from './lib/logging/markdown-session-log';
import { EventLogSink, NullLogSink } from './lib/logging/event-log-sink';
import { FrameProcessor } from './lib/session/frame-processor';
import { TemperatureMonitor } from './lib/telemetry/temperature-monitor';
import logger from './lib/logging/logger';

const USAGE = `Usage: feeder-watch replay <frames.jsonl> [options]

Options:
  --config <file>    JSON config file
  --preset <name>    default | busy-feeder | quiet | debug
  --logs <dir>       session log directory (overrides logging.logsPath)
  --mode <mode>      all | changes_only | minimal
  -h, --help         show this help`;

function buildConfig(values: { config?: string; preset?: string; logs?: string; mode?: string }): FeederWatchConfig {
  const base = values.config ? loadConfig(values.config, values.preset) : resolveConfig({}, values.preset);

  let consoleOutputMode = base.logging.consoleOutputMode;
  if (values.mode !== undefined) {
    if (!isConsoleOutputMode(values.mode)) {
      throw new ConfigError(`--mode must be one of all, changes_only, minimal; got ${values.mode}`);
    }
    consoleOutputMode = values.mode;
  }

  return {
    ...base,
    logging: {
      ...base.logging,
      logsPath: values.logs ?? base.logging.logsPath,
      consoleOutputMode
    }
  };
}

export async function runReplay(framesPath: string, config: FeederWatchConfig): Promise<void> {
  const sink: EventLogSink = config.logging.enableTextLog ? new MarkdownSessionLog({ config }) : new NullLogSink();
  if (sink instanceof MarkdownSessionLog) {
    logger.info({ sessionDir: sink.paths.sessionDir }, 'Session logs created');
  }

  const processor = new FrameProcessor({ config, sink });

  let monitor: TemperatureMonitor | null = null;
  if (config.systemMonitoring.enableTemperatureLogging) {
    monitor = new TemperatureMonitor({
      sink,
      intervalSeconds: config.systemMonitoring.temperatureLogIntervalMinutes * 60,
      getFps: () => processor.getFps()
    });
    await monitor.start();
  }

  // Bad lines and out-of-order frames are skipped; the session carries on
  let skipped = 0;
  const source = new JsonlDetectionSource(framesPath, {
    onInvalidLine: err => {
      skipped++;
      logger.warn({ err, line: err.line }, 'Skipping malformed frame');
    }
  });

  try {
    for await (const frame of source) {
      try {
        processor.process(frame);
      } catch (err) {
        if (!(err instanceof TrackerInputError)) throw err;
        skipped++;
        logger.warn({ err, timestamp: frame.timestamp }, 'Skipping rejected frame');
      }
    }
  } finally {
    monitor?.stop();
  }

  const stats = processor.getStats();
  console.log(
    `Frames: ${processor.getFrameNumber()} | Unique birds: ${stats.totalUnique} | Feeder visits: ${stats.totalVisits}`
  );
  if (skipped > 0) {
    console.log(`Skipped frames: ${skipped}`);
  }
}

async function main(argv: string[]): Promise<number> {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      config: { type: 'string' },
      preset: { type: 'string' },
      logs: { type: 'string' },
      mode: { type: 'string' },
      help: { type: 'boolean', short: 'h' }
    }
  });

  const [command, framesPath] = positionals;
  if (values.help || command !== 'replay' || !framesPath) {
    console.log(USAGE);
    return values.help ? 0 : 1;
  }

  await runReplay(framesPath, buildConfig(values));
  return 0;
}

if (require.main === module) {
  main(process.argv.slice(2))
    .then(code => {
      process.exitCode = code;
    })
    .catch(err => {
      logger.error({ err }, 'Replay failed');
      process.exitCode = 1;
    });
}
