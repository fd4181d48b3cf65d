import { AsrError } from './asr/errors.js';
import { API_KEY_ENV, DEFAULTS, type OptionKey, type RawOptions } from './config.js';

export type CliCommand =
  | { kind: 'help' }
  | { kind: 'run'; options: RawOptions; configPath: string | null };

interface FlagSpec {
  key: OptionKey;
  boolean?: boolean;
}

const FLAGS: Record<string, FlagSpec> = {
  '--api-key': { key: 'apiKey' },
  '--model': { key: 'model' },
  '-m': { key: 'model' },
  '--base-url': { key: 'baseUrl' },
  '--sample-rate': { key: 'sampleRate' },
  '-s': { key: 'sampleRate' },
  '--language': { key: 'language' },
  '-l': { key: 'language' },
  '--vad-threshold': { key: 'vadThreshold' },
  '--vad-silence-ms': { key: 'vadSilenceMs' },
  '--keep': { key: 'keep', boolean: true },
  '-k': { key: 'keep', boolean: true },
  '--chunk-bytes': { key: 'chunkBytes' },
  '--capture': { key: 'capture' },
  '--max-buffered-bytes': { key: 'maxBufferedBytes' },
  '--connect-timeout-ms': { key: 'connectTimeoutMs' },
  '--configure-timeout-ms': { key: 'configureTimeoutMs' },
  '--drain-timeout-ms': { key: 'drainTimeoutMs' },
  '--stop-deadline-ms': { key: 'stopDeadlineMs' },
};

export function usage(): string {
  return `Usage: qasr [options]

Realtime speech transcription. Reads raw PCM (s16le, mono) from stdin,
streams it to a realtime ASR service and writes one JSON event per line
to stdout. Logs go to stderr.

Options:
  --api-key <key>              API key (default: $${API_KEY_ENV})
  -m, --model <name>           ASR model (default: ${DEFAULTS.model})
  --base-url <url>             Realtime endpoint (default: ${DEFAULTS.baseUrl})
  -s, --sample-rate <hz>       Input sample rate (default: ${DEFAULTS.sampleRate})
  -l, --language <code>        Recognition language (default: ${DEFAULTS.language})
  --vad-threshold <0..1>       Server VAD threshold (default: ${DEFAULTS.vadThreshold})
  --vad-silence-ms <ms>        Server VAD silence duration (default: ${DEFAULTS.vadSilenceMs})
  -k, --keep                   Keep the session open after input ends
  --chunk-bytes <n>            Audio bytes per message (default: ${DEFAULTS.chunkBytes})
  --capture <format>:<device>  Capture with ffmpeg instead of reading stdin
  --max-buffered-bytes <n>     Outbound bytes in flight before input is paused (default: ${DEFAULTS.maxBufferedBytes})
  --connect-timeout-ms <ms>    (default: ${DEFAULTS.connectTimeoutMs})
  --configure-timeout-ms <ms>  Wait for the session acknowledgement (default: ${DEFAULTS.configureTimeoutMs})
  --drain-timeout-ms <ms>      Wait for final events after input ends (default: ${DEFAULTS.drainTimeoutMs})
  --stop-deadline-ms <ms>      Force close this long after Ctrl-C (default: ${DEFAULTS.stopDeadlineMs})
  --config <path>              JSON file with any option above (camelCase keys)
  -h, --help                   Show this help

Examples (ffmpeg -> stdin):
  macOS:   ffmpeg -f avfoundation -i ":0" -f s16le -ar 16000 -ac 1 - 2>/dev/null | qasr
  Linux:   ffmpeg -f alsa -i default -f s16le -ar 16000 -ac 1 - 2>/dev/null | qasr
  Windows: ffmpeg -f dshow -i audio="Microphone" -f s16le -ar 16000 -ac 1 - 2>NUL | qasr

Built-in capture:
  qasr --capture alsa:default -l en

Exit status: 0 when the session closed normally, 1 on failure,
130 when it had to be forced closed after a stop request.`;
}

/** Parse argv (without the node and script entries). Flags take `--flag value` or `--flag=value`. */
export function parseArgs(argv: string[]): CliCommand {
  const options: RawOptions = {};
  let configPath: string | null = null;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '-h' || arg === '--help') {
      return { kind: 'help' };
    }

    const eq = arg.startsWith('--') ? arg.indexOf('=') : -1;
    const name = eq >= 0 ? arg.slice(0, eq) : arg;
    const inline = eq >= 0 ? arg.slice(eq + 1) : undefined;

    const takeValue = (): string => {
      if (inline !== undefined) return inline;
      const next = argv[i + 1];
      if (next === undefined || (next.startsWith('-') && next.length > 1 && !/^-\d/.test(next))) {
        throw new AsrError('ConfigurationError', `Option ${name} requires a value`);
      }
      i++;
      return next;
    };

    if (name === '--config') {
      configPath = takeValue();
      continue;
    }

    const spec = Object.hasOwn(FLAGS, name) ? FLAGS[name] : undefined;
    if (!spec) {
      throw new AsrError('ConfigurationError', `Unknown option: ${arg}`);
    }
    if (spec.boolean) {
      options[spec.key] = inline === undefined ? true : inline;
    } else {
      options[spec.key] = takeValue();
    }
  }

  return { kind: 'run', options, configPath };
}
