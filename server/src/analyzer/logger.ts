import debug from 'debug';

const rootNamespace = 'calltree';

const logger = debug(rootNamespace);

export function createLogger(scope: string): debug.Debugger {
  return logger.extend(scope);
}
