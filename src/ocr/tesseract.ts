import { execFile } from 'node:child_process';

import type { CallOptions, TextExtractorBackend } from '../pipeline/types.js';
import { fail, ok, settle, toErrorMessage, type Result } from '../utils/result.js';

const TESSERACT_MAX_BUFFER = 8 * 1024 * 1024;

type TesseractOptions = {
  command: string;
  languages: string[];
  timeoutMs: number;
};

type RunTesseract = (input: {
  command: string;
  args: string[];
  stdin: Uint8Array;
  signal: AbortSignal;
}) => Promise<Result<string>>;

export function buildTesseractArgs(languages: string[]): string[] {
  // stdin -> stdout, LSTM engine, single uniform block of text
  return ['stdin', 'stdout', '-l', languages.join('+'), '--oem', '3', '--psm', '6'];
}

const isMissingBinary = (err: unknown): boolean =>
  typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';

export const runTesseractProcess: RunTesseract = ({ command, args, stdin, signal }) =>
  new Promise((resolve) => {
    const child = execFile(
      command,
      args,
      { maxBuffer: TESSERACT_MAX_BUFFER, encoding: 'utf8', signal },
      (err, stdout, stderr) => {
        if (err) {
          if (isMissingBinary(err)) {
            resolve(fail('unavailable', `tesseract executable not found (${command})`));
            return;
          }
          const detail = stderr.trim() || toErrorMessage(err);
          resolve(fail('backend_failure', `tesseract failed: ${detail}`));
          return;
        }
        resolve(ok(stdout));
      },
    );

    // EPIPE when tesseract exits early; the exit callback reports the real failure.
    child.stdin?.on('error', () => undefined);
    child.stdin?.end(Buffer.from(stdin));
  });

export function createTesseractBackend(
  options: TesseractOptions,
  deps: { run?: RunTesseract } = {},
): TextExtractorBackend {
  const run = deps.run ?? runTesseractProcess;
  const args = buildTesseractArgs(options.languages);

  return {
    name: 'tesseract',
    wantsPreprocessedInput: true,
    extract: (imageBytes: Uint8Array, callOptions: CallOptions = {}) =>
      settle({ label: 'tesseract', timeoutMs: options.timeoutMs, signal: callOptions.signal }, (signal) =>
        run({ command: options.command, args, stdin: imageBytes, signal }),
      ),
  };
}
