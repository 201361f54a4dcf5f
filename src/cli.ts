#!/usr/bin/env node
import { parseCli, USAGE } from './cli/args.js';
import { EXIT_CODES, runCommand } from './cli/commands.js';
import { config } from './config.js';
import { InvalidInputError } from './errors.js';
import { logger } from './utils/logger.js';
import { ClipVerifier } from './verify/clip-verifier.js';
import { PlaylistVerifier } from './verify/playlist-verifier.js';
import { compileHostPool, loadDefaultHosts } from './vods/host-pool.js';

async function main(argv: string[]): Promise<number> {
  let parsed: ReturnType<typeof parseCli>;
  try {
    parsed = parseCli(argv, config);
  } catch (err) {
    if (!(err instanceof InvalidInputError)) throw err;
    console.error(`${err.message}\n\n${USAGE}`);
    return EXIT_CODES.error;
  }

  const { command, options } = parsed;
  if (command.name === 'help') {
    console.log(USAGE);
    return EXIT_CODES.ok;
  }
  if (options.verbose) logger.level = 'debug';

  const defaults = loadDefaultHosts();
  const verifierOptions = { timeoutMs: options.timeoutMs };

  const controller = new AbortController();
  const onInterrupt = (): void => {
    logger.info('Interrupted, stopping');
    controller.abort(new Error('Interrupted'));
  };
  process.once('SIGINT', onInterrupt);

  try {
    return await runCommand(command, {
      hosts: { vods: compileHostPool(defaults.vods, options.cdnFile), clips: defaults.clips },
      vodVerifier: new PlaylistVerifier(verifierOptions),
      clipVerifier: new ClipVerifier(verifierOptions),
      retry: {
        maxRetries: options.retries,
        backoff: { type: 'exponential', delay: config.RETRY_BASE_DELAY_MS, maxDelay: config.RETRY_MAX_DELAY_MS },
      },
      options,
      signal: controller.signal,
      print: (line) => console.log(line),
    });
  } catch (err) {
    if (controller.signal.aborted) {
      console.error('Aborted');
      return EXIT_CODES.aborted;
    }
    if (err instanceof InvalidInputError) {
      console.error(err.message);
    } else {
      logger.error({ err }, 'Command failed');
      console.error(err instanceof Error ? err.message : String(err));
    }
    return EXIT_CODES.error;
  } finally {
    process.off('SIGINT', onInterrupt);
  }
}

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    logger.fatal(err, 'Unexpected failure');
    process.exitCode = EXIT_CODES.error;
  });
