import type { Reporter } from '../../src/core/reporter.js';

export interface RecordingReporter extends Reporter {
  debugs: string[];
  infos: string[];
  warnings: string[];
}

export function recordingReporter(): RecordingReporter {
  const debugs: string[] = [];
  const infos: string[] = [];
  const warnings: string[] = [];
  return {
    debugs,
    infos,
    warnings,
    debug: (message) => debugs.push(message),
    info: (message) => infos.push(message),
    warn: (message) => warnings.push(message),
  };
}
