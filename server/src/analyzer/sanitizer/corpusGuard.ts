import { CallTreeError, errorMessage } from '../errors.js';
import { createLogger } from '../logger.js';
import { restoreFiles, restoreFilesSync } from './sanitize.js';
import { sanitizeCorpus, type SanitizeCorpusOptions } from './workerPool.js';

const log = createLogger('guard');

const TERMINATION_SIGNALS: NodeJS.Signals[] = ['SIGINT', 'SIGTERM', 'SIGQUIT', 'SIGHUP'];

type SignalListener = (signal: NodeJS.Signals) => void;

export type SignalSource = {
  on(signal: NodeJS.Signals, listener: SignalListener): unknown;
  removeListener(signal: NodeJS.Signals, listener: SignalListener): unknown;
};

export type CorpusGuardOptions = SanitizeCorpusOptions & {
  exit?: (code: number) => void;
  /** Where termination signals arrive; `process` unless overridden. */
  signals?: SignalSource;
};

/**
 * Runs `run` while every file in `files` is sanitized on disk. The originals are back in
 * place when this settles, whether `run` resolved or threw; a termination signal restores
 * them synchronously and exits with code 0.
 *
 * A failed restore is reported over a failure of `run`, which becomes its `cause`.
 */
export async function withSanitizedCorpus<T>(
  files: string[],
  run: () => Promise<T>,
  options: CorpusGuardOptions = {},
): Promise<T> {
  const exit = options.exit ?? ((code: number) => process.exit(code));
  const signals: SignalSource = options.signals ?? process;

  const detach = (): void => {
    for (const signal of TERMINATION_SIGNALS) signals.removeListener(signal, onSignal);
  };

  function onSignal(signal: NodeJS.Signals): void {
    detach();
    console.error(`Abnormal exit caused by ${signal}, restoring sources`);
    try {
      restoreFilesSync(files);
    } catch (error) {
      console.error(errorMessage(error));
    }
    exit(0);
  }

  for (const signal of TERMINATION_SIGNALS) signals.on(signal, onSignal);

  let outcome: { ok: true; value: T } | { ok: false; error: unknown };
  try {
    const sanitized = await sanitizeCorpus(files, options);
    log('sanitized %d of %d files', sanitized, files.length);
    outcome = { ok: true, value: await run() };
  } catch (error) {
    outcome = { ok: false, error };
  }

  detach();
  try {
    const restored = await restoreFiles(files);
    log('restored %d files', restored);
  } catch (restoreError) {
    if (outcome.ok) throw restoreError;
    throw new CallTreeError('IO', errorMessage(restoreError), { cause: outcome.error });
  }

  if (!outcome.ok) throw outcome.error;
  return outcome.value;
}
