import { DeepPartial, FeederWatchConfig } from '../../types';

export const DEFAULT_CONFIG: FeederWatchConfig = {
  tracking: {
    enableTracking: true,
    birdTimeoutSeconds: 30,
    enableVisitCounter: true,
    minTimeBetweenVisitsSeconds: 10
  },
  detection: {
    targetClasses: ['bird'],
    minConfidence: 0.3,
    minBboxArea: 0,
    maxBboxArea: 1
  },
  logging: {
    enableTextLog: true,
    consoleOutputMode: 'minimal',
    logsPath: 'logs',
    logFilenamePattern: 'bird_detections_{timestamp}.md'
  },
  frameSaving: {
    enablePhotoSave: false,
    minSaveIntervalSeconds: 5
  },
  systemMonitoring: {
    enableTemperatureLogging: false,
    temperatureLogIntervalMinutes: 5,
    temperatureLogFilename: 'temperature_{timestamp}.md'
  }
};

export const CONFIG_PRESETS: Record<string, DeepPartial<FeederWatchConfig>> = {
  'default': {},
  'busy-feeder': {
    // Many short hops between perch and feeder: merge them into one visit
    tracking: {
      birdTimeoutSeconds: 60,
      minTimeBetweenVisitsSeconds: 20
    },
    logging: {
      consoleOutputMode: 'changes_only'
    }
  },
  'quiet': {
    tracking: {
      birdTimeoutSeconds: 15,
      minTimeBetweenVisitsSeconds: 5
    },
    detection: {
      minConfidence: 0.4
    },
    logging: {
      consoleOutputMode: 'minimal'
    }
  },
  'debug': {
    logging: {
      consoleOutputMode: 'all'
    },
    systemMonitoring: {
      enableTemperatureLogging: true,
      temperatureLogIntervalMinutes: 1
    }
  }
};
