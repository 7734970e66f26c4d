import { ConsoleOutputMode, VisitTransition } from '../../types';

export const CONSOLE_OUTPUT_MODES: readonly ConsoleOutputMode[] = ['all', 'changes_only', 'minimal'];

export const STATUS_EVERY_N_FRAMES = 30;

export function isConsoleOutputMode(value: unknown): value is ConsoleOutputMode {
  return typeof value === 'string' && (CONSOLE_OUTPUT_MODES as readonly string[]).includes(value);
}

// Verbosity decides what gets written or printed, never what gets counted.

export function shouldWriteRecord(
  mode: ConsoleOutputMode,
  frame: { hasDetections: boolean; visitStarted: boolean }
): boolean {
  if (!frame.hasDetections) return false;
  return mode === 'all' || frame.visitStarted;
}

export function shouldPrintTransition(mode: ConsoleOutputMode, transition: VisitTransition): boolean {
  switch (transition) {
    case 'first-visit':
    case 'new-visit':
    case 'group-growth':
      return mode === 'all' || mode === 'changes_only';
    case 'continuation':
    case 'departure':
      return mode === 'all';
    default:
      return false;
  }
}

export function shouldPrintStatus(mode: ConsoleOutputMode, frameNumber: number): boolean {
  return mode === 'all' && frameNumber % STATUS_EVERY_N_FRAMES === 0;
}

export function shouldPrintChanges(mode: ConsoleOutputMode): boolean {
  return mode === 'changes_only';
}
