import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import type { CacheWarning, DiagnosticsSink } from '../src/types';

export interface RecordingDiagnostics extends DiagnosticsSink {
  warning: jest.Mock<void, [CacheWarning]>;
  info: jest.Mock<void, [string]>;
}

export function recordingDiagnostics(): RecordingDiagnostics {
  return {
    warning: jest.fn<void, [CacheWarning]>(),
    info: jest.fn<void, [string]>(),
  };
}

export async function makeTempRoot(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'digest-cache-'));
}

export function hexDigest(hex: string): Buffer {
  return Buffer.from(hex, 'hex');
}

export function warningCodes(diagnostics: RecordingDiagnostics): number[] {
  return diagnostics.warning.mock.calls.map(([event]) => event.code);
}
