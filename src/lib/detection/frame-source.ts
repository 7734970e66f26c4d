import fs from 'node:fs';
import readline from 'node:readline';
import { Detection, DetectionFrame } from '../../types';

/**
 * Anything that yields detection frames in timestamp order.
 */
export type DetectionSource = AsyncIterable<DetectionFrame>;

export class FrameParseError extends Error {
  constructor(message: string, readonly line?: number) {
    super(line !== undefined ? `line ${line}: ${message}` : message);
    this.name = 'FrameParseError';
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readNumber(obj: Record<string, unknown>, key: string, where: string): number {
  const value = obj[key];
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new FrameParseError(`${where}.${key} must be a finite number`);
  }
  return value;
}

function parseDetection(value: unknown, index: number): Detection {
  const where = `detections[${index}]`;
  if (!isRecord(value)) {
    throw new FrameParseError(`${where} must be an object`);
  }
  if (typeof value.label !== 'string') {
    throw new FrameParseError(`${where}.label must be a string`);
  }

  return {
    label: value.label,
    confidence: readNumber(value, 'confidence', where),
    x: readNumber(value, 'x', where),
    y: readNumber(value, 'y', where),
    width: readNumber(value, 'width', where),
    height: readNumber(value, 'height', where)
  };
}

export function parseDetectionFrame(value: unknown): DetectionFrame {
  if (!isRecord(value)) {
    throw new FrameParseError('frame must be an object');
  }
  const detections = value.detections ?? [];
  if (!Array.isArray(detections)) {
    throw new FrameParseError('frame.detections must be an array');
  }

  return {
    timestamp: readNumber(value, 'timestamp', 'frame'),
    detections: detections.map(parseDetection)
  };
}

export interface JsonlDetectionSourceOptions {
  /** Called for each malformed line, which is then skipped. Without it the first one throws. */
  onInvalidLine?: (error: FrameParseError) => void;
}

/**
 * Reads recorded frames from a JSON-lines file, one frame per line.
 * Blank lines are skipped.
 */
export class JsonlDetectionSource implements DetectionSource {
  constructor(private filePath: string, private options: JsonlDetectionSourceOptions = {}) {}

  async *[Symbol.asyncIterator](): AsyncIterator<DetectionFrame> {
    const lines = readline.createInterface({
      input: fs.createReadStream(this.filePath, { encoding: 'utf-8' }),
      crlfDelay: Infinity
    });

    let lineNumber = 0;
    for await (const line of lines) {
      lineNumber++;
      if (line.trim() === '') continue;

      let frame: DetectionFrame;
      try {
        frame = this.parseLine(line, lineNumber);
      } catch (error) {
        if (error instanceof FrameParseError && this.options.onInvalidLine) {
          this.options.onInvalidLine(error);
          continue;
        }
        throw error;
      }
      yield frame;
    }
  }

  private parseLine(line: string, lineNumber: number): DetectionFrame {
    let raw: unknown;
    try {
      raw = JSON.parse(line);
    } catch (error) {
      throw new FrameParseError(error instanceof Error ? error.message : 'invalid JSON', lineNumber);
    }

    try {
      return parseDetectionFrame(raw);
    } catch (error) {
      if (error instanceof FrameParseError && error.line === undefined) {
        throw new FrameParseError(error.message, lineNumber);
      }
      throw error;
    }
  }
}
