#!/usr/bin/env node
import { parseArgs, usage } from './cli.js';
import { loadConfigFile, resolveConfig, type RawOptions } from './config.js';
import { runTranscription, ExitCode } from './app.js';
import { isAsrError } from './asr/errors.js';
import { logger } from './logger.js';

const controller = new AbortController();

// --- Graceful shutdown ---

let stopCount = 0;

function requestShutdown(signal: NodeJS.Signals): void {
  stopCount++;
  if (stopCount === 1) {
    logger.info(`Received ${signal} -- draining session...`);
    controller.abort(signal);
    return;
  }
  logger.warn(`Received ${signal} again -- exiting without draining`);
  process.exit(ExitCode.Cancelled);
}

process.on('SIGTERM', () => requestShutdown('SIGTERM'));
process.on('SIGINT', () => requestShutdown('SIGINT'));

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled promise rejection:', reason);
});

process.on('uncaughtException', (err) => {
  logger.error('Uncaught exception:', err);
  process.exit(ExitCode.Failure);
});

// Consumer went away (e.g. `qasr | head`): nothing left to write to
process.stdout.on('error', (err: NodeJS.ErrnoException) => {
  if (err.code === 'EPIPE') {
    logger.warn('stdout closed by consumer, stopping');
    controller.abort('stdout closed');
    return;
  }
  logger.error('stdout error:', err);
});

// --- Startup ---

async function main(): Promise<number> {
  const command = parseArgs(process.argv.slice(2));
  if (command.kind === 'help') {
    process.stdout.write(`${usage()}\n`);
    return ExitCode.Ok;
  }

  const layers: RawOptions[] = command.configPath
    ? [loadConfigFile(command.configPath), command.options]
    : [command.options];
  const config = resolveConfig(layers);

  if (!config.capture && process.stdin.isTTY) {
    process.stdout.write(`${usage()}\n`);
    return ExitCode.Ok;
  }

  logger.info('qasr starting...');
  logger.info(`  Endpoint: ${config.baseUrl}`);
  logger.info(`  Model: ${config.session.model}, language: ${config.session.language}`);
  logger.info(`  Audio: ${config.audio.sampleRate}Hz s16le mono, ${config.policy.chunkBytes}-byte chunks`);
  logger.info(`  VAD: threshold ${config.session.vadThreshold}, silence ${config.session.vadSilenceMs}ms`);

  return runTranscription(config, {
    stdin: process.stdin,
    stdout: process.stdout,
    signal: controller.signal,
  });
}

main().then(
  (code) => process.exit(code),
  (err: unknown) => {
    if (isAsrError(err, 'ConfigurationError')) {
      logger.error(`Configuration error: ${err.message}`);
      process.stderr.write('Run qasr --help for usage.\n');
    } else {
      logger.error('Fatal startup error:', err);
    }
    process.exit(ExitCode.Failure);
  }
);
