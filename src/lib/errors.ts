export class TrackerInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TrackerInputError';
  }
}

export class ConfigError extends Error {
  constructor(message: string, readonly path?: string) {
    super(path ? `${path}: ${message}` : message);
    this.name = 'ConfigError';
  }
}

export class ProcessorBusyError extends Error {
  constructor() {
    super('FrameProcessor.process called while a previous frame is still being processed');
    this.name = 'ProcessorBusyError';
  }
}
