/**
 * Known failure signatures in task output.
 * Informational only: a match is logged once per run and never changes the run's status.
 */
import type { Logger } from '../logger.js';

export type ErrorSignatureType =
  | 'missing-module'
  | 'permission-denied'
  | 'connection-refused'
  | 'command-not-found'
  | 'out-of-memory';

interface ErrorSignature {
  type: ErrorSignatureType;
  patterns: RegExp[];
  hint: string;
}

const errorSignatures: ErrorSignature[] = [
  {
    type: 'missing-module',
    patterns: [
      /Cannot find module/i,
      /ERR_MODULE_NOT_FOUND/,
      /ModuleNotFoundError/,
      /No module named/i,
    ],
    hint: 'a dependency is missing; install the task\'s dependencies',
  },
  {
    type: 'permission-denied',
    patterns: [/permission.*denied/i, /\bEACCES\b/i, /\bEPERM\b/],
    hint: 'the task lacks permission for a file or executable',
  },
  {
    type: 'connection-refused',
    patterns: [/\bECONNREFUSED\b/i, /connection.*refused/i],
    hint: 'a service the task connects to is not reachable',
  },
  {
    type: 'command-not-found',
    patterns: [/command.*not.*found/i, /\bENOENT\b.*spawn/i],
    hint: 'an executable the task calls is not on PATH',
  },
  {
    type: 'out-of-memory',
    patterns: [/heap out of memory/i, /\bMemoryError\b/, /Killed\s*$/],
    hint: 'the task ran out of memory',
  },
];

export function classifyLine(line: string): ErrorSignature | undefined {
  return errorSignatures.find((sig) => sig.patterns.some((re) => re.test(line)));
}

/** Per-run matcher; warns the first time each signature is seen. */
export class ErrorSignatureScanner {
  private readonly seen = new Set<ErrorSignatureType>();

  constructor(private readonly log: Logger) {}

  scan(line: string): ErrorSignatureType | undefined {
    const sig = classifyLine(line);
    if (!sig || this.seen.has(sig.type)) return undefined;
    this.seen.add(sig.type);
    this.log.warn({ signature: sig.type }, `detected ${sig.type} in task output: ${sig.hint}`);
    return sig.type;
  }

  get detected(): ErrorSignatureType[] {
    return [...this.seen];
  }
}
