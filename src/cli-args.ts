import { env } from './env.js';

export interface TokenCliOptions {
  interactive: boolean;
  verbose: boolean;
  cacheFile?: string;
}

export function parseTokenCliArgs(
  argv: string[],
  warn: (msg: string) => void = (msg) => console.error(msg)
): TokenCliOptions {
  const options: TokenCliOptions = { interactive: !env.XBL_NON_INTERACTIVE, verbose: env.AUTH_VERBOSE };

  for (let i = 2; i < argv.length; i += 1) {
    const arg = argv[i];
    if (arg === '--non-interactive') {
      options.interactive = false;
      continue;
    }
    if (arg === '--verbose' || arg === '-v') {
      options.verbose = true;
      continue;
    }
    if (arg === '--cache-file') {
      const value = argv[i + 1];
      if (value && !value.startsWith('-')) {
        options.cacheFile = value;
        i += 1;
      } else {
        warn('Warning: --cache-file needs a path; using the default cache location');
      }
    }
  }

  return options;
}
