#!/usr/bin/env node
/**
 * XBL3.0 Token CLI
 *
 * Prints the composite credential on stdout and nothing else, so a parent
 * process can capture it. All diagnostics go to stderr.
 */

import './env.js';

import { createXbl3Pipeline } from './auth/index.js';
import { parseTokenCliArgs } from './cli-args.js';
import { toErrorMessage } from './utils/errors.js';

const debug = (msg: string): void => console.error(msg);

async function main(): Promise<number> {
  const options = parseTokenCliArgs(process.argv);
  debug(`XBL3 token CLI starting (Node ${process.version})`);

  const pipeline = await createXbl3Pipeline({
    interactive: options.interactive,
    verbose: options.verbose,
    cacheFile: options.cacheFile,
    log: debug,
  });

  const result = await pipeline.getCompositeCredential();
  if (!result.success) {
    debug(`Failed to get XBL3.0 token [${result.error.kind}]: ${result.error.message}`);
    return 1;
  }

  console.log(result.value);
  return 0;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    debug(`Unhandled exception: ${toErrorMessage(error)}`);
    process.exitCode = 1;
  });
