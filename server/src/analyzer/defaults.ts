export const DEFAULT_FILENAME_PATTERN = '\\.(c|cc|cpp|C|h|hh|hpp|H)$';

export const DEFAULT_IGNORE_GLOBS = ['*test*', '*benchmark*', '*CMakeFiles*', '*contrib/*', '*thirdparty/*', '*3rdparty/*'];

// Keywords, casts and logging/assert helpers that look like calls but never carry useful edges.
export const DEFAULT_IGNORED_NAMES = [
  'for',
  'if',
  'while',
  'switch',
  'catch',
  'log',
  'warn',
  'trace',
  'debug',
  'defined',
  'error',
  'fatal',
  'static_cast',
  'reinterpret_cast',
  'const_cast',
  'dynamic_cast',
  'return',
  'assert',
  'sizeof',
  'alignas',
  'constexpr',
  'set',
  'get',
];

export const DEFAULT_TRIVIAL_THRESHOLD = 50;
export const DEFAULT_LENGTH_THRESHOLD = 3;

export const DEFAULT_MAX_DEPTH = 100_000;
export const DEFAULT_FILTER = '.*';

export const DEFAULT_WORKER_GROUPS = 10;

export const DEFAULT_IGNORED_DIR_NAMES = ['.git', 'node_modules'];
