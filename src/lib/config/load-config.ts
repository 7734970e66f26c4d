import fs from 'node:fs';
import { DeepPartial, FeederWatchConfig } from '../../types';
import { ConfigError } from '../errors';
import { isConsoleOutputMode } from '../logging/emission-policy';
import { CONFIG_PRESETS, DEFAULT_CONFIG } from './presets';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function mergeSection<T extends object>(base: T, override: Partial<T> | undefined): T {
  return override ? { ...base, ...override } : { ...base };
}

export function mergeConfig(
  base: FeederWatchConfig,
  override: DeepPartial<FeederWatchConfig> = {}
): FeederWatchConfig {
  return {
    tracking: mergeSection(base.tracking, override.tracking),
    detection: mergeSection(base.detection, override.detection),
    logging: mergeSection(base.logging, override.logging),
    frameSaving: mergeSection(base.frameSaving, override.frameSaving),
    systemMonitoring: mergeSection(base.systemMonitoring, override.systemMonitoring)
  };
}

function requireNonNegative(value: number, path: string): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new ConfigError(`must be a non-negative number, got ${value}`, path);
  }
}

function requireBoolean(value: boolean, path: string): void {
  if (typeof value !== 'boolean') {
    throw new ConfigError(`must be true or false`, path);
  }
}

function requireString(value: string, path: string): void {
  if (typeof value !== 'string' || value.length === 0) {
    throw new ConfigError('must be a non-empty string', path);
  }
}

export function validateConfig(config: FeederWatchConfig): FeederWatchConfig {
  const { tracking, detection, logging, frameSaving, systemMonitoring } = config;

  requireBoolean(tracking.enableTracking, 'tracking.enableTracking');
  requireBoolean(tracking.enableVisitCounter, 'tracking.enableVisitCounter');
  requireNonNegative(tracking.birdTimeoutSeconds, 'tracking.birdTimeoutSeconds');
  requireNonNegative(tracking.minTimeBetweenVisitsSeconds, 'tracking.minTimeBetweenVisitsSeconds');

  if (!Array.isArray(detection.targetClasses) || detection.targetClasses.some(c => typeof c !== 'string')) {
    throw new ConfigError('must be a list of class labels', 'detection.targetClasses');
  }
  requireNonNegative(detection.minConfidence, 'detection.minConfidence');
  if (detection.minConfidence > 1) {
    throw new ConfigError(`must be at most 1, got ${detection.minConfidence}`, 'detection.minConfidence');
  }
  requireNonNegative(detection.minBboxArea, 'detection.minBboxArea');
  requireNonNegative(detection.maxBboxArea, 'detection.maxBboxArea');
  if (detection.minBboxArea > detection.maxBboxArea) {
    throw new ConfigError('must not exceed detection.maxBboxArea', 'detection.minBboxArea');
  }

  requireBoolean(logging.enableTextLog, 'logging.enableTextLog');
  if (!isConsoleOutputMode(logging.consoleOutputMode)) {
    throw new ConfigError(
      `must be one of all, changes_only, minimal; got ${String(logging.consoleOutputMode)}`,
      'logging.consoleOutputMode'
    );
  }
  requireString(logging.logsPath, 'logging.logsPath');
  requireString(logging.logFilenamePattern, 'logging.logFilenamePattern');

  requireBoolean(frameSaving.enablePhotoSave, 'frameSaving.enablePhotoSave');
  requireNonNegative(frameSaving.minSaveIntervalSeconds, 'frameSaving.minSaveIntervalSeconds');

  requireBoolean(systemMonitoring.enableTemperatureLogging, 'systemMonitoring.enableTemperatureLogging');
  requireNonNegative(systemMonitoring.temperatureLogIntervalMinutes, 'systemMonitoring.temperatureLogIntervalMinutes');
  if (systemMonitoring.temperatureLogIntervalMinutes === 0) {
    throw new ConfigError('must be greater than 0', 'systemMonitoring.temperatureLogIntervalMinutes');
  }
  requireString(systemMonitoring.temperatureLogFilename, 'systemMonitoring.temperatureLogFilename');

  return config;
}

export function resolveConfig(
  override: DeepPartial<FeederWatchConfig> = {},
  preset: string = 'default'
): FeederWatchConfig {
  const presetConfig = CONFIG_PRESETS[preset];
  if (!presetConfig) {
    throw new ConfigError(`unknown preset "${preset}"`);
  }
  return validateConfig(mergeConfig(mergeConfig(DEFAULT_CONFIG, presetConfig), override));
}

type RawSection = Record<string, unknown>;

function readBoolean(section: RawSection, key: string, fallback: boolean, path: string): boolean {
  const value = section[key];
  if (value === undefined) return fallback;
  if (typeof value !== 'boolean') {
    throw new ConfigError('must be true or false', path);
  }
  return value;
}

function readNumber(section: RawSection, key: string, fallback: number, path: string): number {
  const value = section[key];
  if (value === undefined) return fallback;
  if (typeof value !== 'number') {
    throw new ConfigError(`must be a number, got ${JSON.stringify(value)}`, path);
  }
  return value;
}

function readString(section: RawSection, key: string, fallback: string, path: string): string {
  const value = section[key];
  if (value === undefined) return fallback;
  if (typeof value !== 'string') {
    throw new ConfigError(`must be a string, got ${JSON.stringify(value)}`, path);
  }
  return value;
}

function readStringList(section: RawSection, key: string, fallback: string[], path: string): string[] {
  const value = section[key];
  if (value === undefined) return fallback;
  if (!Array.isArray(value) || value.some(v => typeof v !== 'string')) {
    throw new ConfigError('must be a list of strings', path);
  }
  return value.map(String);
}

function readSection(raw: RawSection, name: keyof FeederWatchConfig, known: string[], filePath: string): RawSection {
  const section = raw[name];
  if (section === undefined) return {};
  if (!isRecord(section)) {
    throw new ConfigError(`section "${name}" must be an object`, filePath);
  }
  for (const key of Object.keys(section)) {
    if (!known.includes(key)) {
      throw new ConfigError(`unknown key "${name}.${key}"`, filePath);
    }
  }
  return section;
}

/**
 * Read a JSON config file over the defaults (and optional preset). Unknown
 * sections and keys are rejected so that typos surface at startup.
 */
export function loadConfig(filePath: string, preset: string = 'default'): FeederWatchConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`cannot read config: ${reason}`, filePath);
  }

  if (!isRecord(raw)) {
    throw new ConfigError('config must be a JSON object', filePath);
  }
  for (const key of Object.keys(raw)) {
    if (!(key in DEFAULT_CONFIG)) {
      throw new ConfigError(`unknown section "${key}"`, filePath);
    }
  }

  const presetConfig = CONFIG_PRESETS[preset];
  if (!presetConfig) {
    throw new ConfigError(`unknown preset "${preset}"`);
  }
  const base = mergeConfig(DEFAULT_CONFIG, presetConfig);

  const t = readSection(raw, 'tracking', Object.keys(base.tracking), filePath);
  const d = readSection(raw, 'detection', Object.keys(base.detection), filePath);
  const l = readSection(raw, 'logging', Object.keys(base.logging), filePath);
  const f = readSection(raw, 'frameSaving', Object.keys(base.frameSaving), filePath);
  const m = readSection(raw, 'systemMonitoring', Object.keys(base.systemMonitoring), filePath);

  const mode = readString(l, 'consoleOutputMode', base.logging.consoleOutputMode, 'logging.consoleOutputMode');
  if (!isConsoleOutputMode(mode)) {
    throw new ConfigError(`must be one of all, changes_only, minimal; got ${mode}`, 'logging.consoleOutputMode');
  }

  return validateConfig({
    tracking: {
      enableTracking: readBoolean(t, 'enableTracking', base.tracking.enableTracking, 'tracking.enableTracking'),
      birdTimeoutSeconds: readNumber(t, 'birdTimeoutSeconds', base.tracking.birdTimeoutSeconds, 'tracking.birdTimeoutSeconds'),
      enableVisitCounter: readBoolean(t, 'enableVisitCounter', base.tracking.enableVisitCounter, 'tracking.enableVisitCounter'),
      minTimeBetweenVisitsSeconds: readNumber(
        t,
        'minTimeBetweenVisitsSeconds',
        base.tracking.minTimeBetweenVisitsSeconds,
        'tracking.minTimeBetweenVisitsSeconds'
      )
    },
    detection: {
      targetClasses: readStringList(d, 'targetClasses', base.detection.targetClasses, 'detection.targetClasses'),
      minConfidence: readNumber(d, 'minConfidence', base.detection.minConfidence, 'detection.minConfidence'),
      minBboxArea: readNumber(d, 'minBboxArea', base.detection.minBboxArea, 'detection.minBboxArea'),
      maxBboxArea: readNumber(d, 'maxBboxArea', base.detection.maxBboxArea, 'detection.maxBboxArea')
    },
    logging: {
      enableTextLog: readBoolean(l, 'enableTextLog', base.logging.enableTextLog, 'logging.enableTextLog'),
      consoleOutputMode: mode,
      logsPath: readString(l, 'logsPath', base.logging.logsPath, 'logging.logsPath'),
      logFilenamePattern: readString(l, 'logFilenamePattern', base.logging.logFilenamePattern, 'logging.logFilenamePattern')
    },
    frameSaving: {
      enablePhotoSave: readBoolean(f, 'enablePhotoSave', base.frameSaving.enablePhotoSave, 'frameSaving.enablePhotoSave'),
      minSaveIntervalSeconds: readNumber(
        f,
        'minSaveIntervalSeconds',
        base.frameSaving.minSaveIntervalSeconds,
        'frameSaving.minSaveIntervalSeconds'
      )
    },
    systemMonitoring: {
      enableTemperatureLogging: readBoolean(
        m,
        'enableTemperatureLogging',
        base.systemMonitoring.enableTemperatureLogging,
        'systemMonitoring.enableTemperatureLogging'
      ),
      temperatureLogIntervalMinutes: readNumber(
        m,
        'temperatureLogIntervalMinutes',
        base.systemMonitoring.temperatureLogIntervalMinutes,
        'systemMonitoring.temperatureLogIntervalMinutes'
      ),
      temperatureLogFilename: readString(
        m,
        'temperatureLogFilename',
        base.systemMonitoring.temperatureLogFilename,
        'systemMonitoring.temperatureLogFilename'
      )
    }
  });
}
