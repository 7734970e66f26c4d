export * from './types';
export { TrackerInputError, ConfigError, ProcessorBusyError } from './lib/errors';
export { VisitDetector } from './lib/tracking/visit-detector';
export type { VisitDetectorParams } from './lib/tracking/visit-detector';
export { PresenceTracker } from './lib/tracking/presence-tracker';
export { SingleSlotMatcher } from './lib/tracking/slot-matcher';
export type { SlotMatcher, SlotAssignment } from './lib/tracking/slot-matcher';
export { SessionCounters } from './lib/tracking/session-counters';
export { DetectionFilter } from './lib/detection/detection-filter';
export { JsonlDetectionSource, FrameParseError, parseDetectionFrame } from './lib/detection/frame-source';
export type { DetectionSource, JsonlDetectionSourceOptions } from './lib/detection/frame-source';
export { NullLogSink } from './lib/logging/event-log-sink';
export type { EventLogSink } from './lib/logging/event-log-sink';
export { MarkdownSessionLog } from './lib/logging/markdown-session-log';
export * from './lib/logging/emission-policy';
export { default as logger, setLogLevel } from './lib/logging/logger';
export { DEFAULT_CONFIG, CONFIG_PRESETS } from './lib/config/presets';
export { loadConfig, resolveConfig, mergeConfig, validateConfig } from './lib/config/load-config';
export { FrameProcessor } from './lib/session/frame-processor';
export type { PhotoSink, FrameProcessorOptions } from './lib/session/frame-processor';
export { ConsoleReporter } from './lib/session/console-reporter';
export { TemperatureMonitor } from './lib/telemetry/temperature-monitor';
export { createThermalZoneReader } from './lib/telemetry/cpu-temperature';
