export interface Detection {
  label: string;
  confidence: number;
  // Normalized to the frame, 0..1
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface DetectionFrame {
  timestamp: number; // wall-clock seconds
  detections: Detection[];
}

export interface IdentitySlot {
  id: string;
  lastSeen: number;
}

export interface VisitState {
  lastFrameCount: number;
  lastAbsenceTime: number | null;
  totalVisits: number;
}

export type VisitTransition =
  | 'first-visit'
  | 'new-visit'
  | 'continuation'
  | 'group-growth'
  | 'departure'
  | 'none';

export interface VisitUpdate {
  visitStarted: boolean;
  transition: VisitTransition;
  totalVisits: number;
  // Seconds since the last departure, set for 'new-visit' and 'continuation'
  secondsSinceAbsence?: number;
}

export interface PresenceUpdate {
  frameCount: number;
  newUniqueCount: number;
  visit: VisitUpdate;
}

export interface SessionStats {
  totalUnique: number;
  totalVisits: number;
  currentActive: number;
  currentOnFrame: number;
  lastAbsenceTime: number | null;
}

export interface CounterChanges {
  visits: number | null;
  unique: number | null;
}

export interface LogRecord {
  timestamp: number;
  frameCount: number;
  activeCount: number;
  totalUnique: number;
  totalVisits: number;
  detections: Detection[];
}

export type LogEventKind = 'visit' | 'new-unique';

export interface LogEvent {
  kind: LogEventKind;
  counterValue: number;
  timestamp: number;
}

export interface TemperatureSample {
  celsius: number;
  timestamp: number;
  fps?: number;
}

export type ConsoleOutputMode = 'all' | 'changes_only' | 'minimal';

export interface TrackingConfig {
  enableTracking: boolean;
  birdTimeoutSeconds: number;
  enableVisitCounter: boolean;
  minTimeBetweenVisitsSeconds: number;
}

export interface DetectionConfig {
  targetClasses: string[];
  minConfidence: number;
  minBboxArea: number;
  maxBboxArea: number;
}

export interface LoggingConfig {
  enableTextLog: boolean;
  consoleOutputMode: ConsoleOutputMode;
  logsPath: string;
  logFilenamePattern: string;
}

export interface FrameSavingConfig {
  enablePhotoSave: boolean;
  minSaveIntervalSeconds: number;
}

export interface SystemMonitoringConfig {
  enableTemperatureLogging: boolean;
  temperatureLogIntervalMinutes: number;
  temperatureLogFilename: string;
}

export interface FeederWatchConfig {
  tracking: TrackingConfig;
  detection: DetectionConfig;
  logging: LoggingConfig;
  frameSaving: FrameSavingConfig;
  systemMonitoring: SystemMonitoringConfig;
}

export type DeepPartial<T> = {
  [K in keyof T]?: T[K] extends unknown[] ? T[K] : T[K] extends object ? DeepPartial<T[K]> : T[K];
};

export interface PhotoRequest {
  frameNumber: number;
  timestamp: number;
  birdCount: number;
  photoNumber: number;
}

export interface FrameResult {
  frameNumber: number;
  fps: number;
  update: PresenceUpdate;
  stats: SessionStats;
  changes: CounterChanges;
  recordWritten: boolean;
  photoSaved: boolean;
}
