import { createRequire } from 'node:module';
import { format as formatArgs } from 'node:util';
import { loadConfig, parsePositiveInt } from '../config.js';
import { ConfigError, DomainCheckError } from '../errors.js';
import { createDomainChecker, type DomainChecker } from '../index.js';
import { DefaultLogger, type ConsoleLike } from '../logging/defaultLogger.js';
import { toBatchBody, toErrorBody, toItemErrorBody, toVerdictBody } from '../response.js';
import type { BatchError, BatchItem, CheckerOptions, Verdict } from '../types.js';
import { splitDomainName } from '../validator.js';

const require = createRequire(import.meta.url);
const { version } = require('../../package.json') as { version: string };

type OutputFormat = 'pretty' | 'json';

export interface ParsedCliArgs {
  options: CheckerOptions;
  domains: string[];
  tld?: string;
  format: OutputFormat;
  batch: boolean;
  colorPreference?: boolean;
  showHelp: boolean;
  showVersion: boolean;
}

export interface Output {
  write(text: string): unknown;
}

export interface CliIo {
  stdout: Output;
  stderr: Output;
  env: NodeJS.ProcessEnv;
  isTTY?: boolean;
  createChecker?: (opts: CheckerOptions) => DomainChecker;
}

export class CliError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliError';
  }
}

function splitFlag(arg: string): { flag: string; inlineValue?: string } {
  if (arg.startsWith('--')) {
    const eq = arg.indexOf('=');
    if (eq !== -1) {
      return { flag: arg.slice(0, eq), inlineValue: arg.slice(eq + 1) };
    }
  }
  return { flag: arg };
}

function readValue(
  argv: string[],
  index: number,
  inlineValue: string | undefined,
  flag: string,
): { value: string; nextIndex: number } {
  if (inlineValue !== undefined) {
    if (!inlineValue) {
      throw new CliError(`Option '${flag}' requires a value`);
    }
    return { value: inlineValue, nextIndex: index + 1 };
  }
  const next = argv[index + 1];
  if (next === undefined) {
    throw new CliError(`Option '${flag}' requires a value`);
  }
  return { value: next, nextIndex: index + 2 };
}

const NUMERIC_FLAGS = {
  '--whois-timeout': 'whoisTimeoutMs',
  '--dns-timeout': 'dnsTimeoutMs',
  '--cache-ttl': 'cacheTtlMs',
  '--max-items': 'maxBatchItems',
  '--concurrency': 'concurrency',
} as const satisfies Record<string, keyof CheckerOptions>;

function isNumericFlag(flag: string): flag is keyof typeof NUMERIC_FLAGS {
  return Object.prototype.hasOwnProperty.call(NUMERIC_FLAGS, flag);
}

export function parseArgs(argv: string[]): ParsedCliArgs {
  const options: CheckerOptions = {};
  const domains: string[] = [];
  let tld: string | undefined;
  let format: OutputFormat = 'pretty';
  let batch = false;
  let colorPreference: boolean | undefined;
  let showHelp = false;
  let showVersion = false;

  let index = 0;
  while (index < argv.length) {
    const arg = argv[index];
    if (arg === '--') {
      domains.push(...argv.slice(index + 1));
      break;
    }

    const { flag, inlineValue } = splitFlag(arg);

    switch (flag) {
      case '-h':
      case '--help':
        showHelp = true;
        index += 1;
        continue;
      case '-v':
      case '--version':
        showVersion = true;
        index += 1;
        continue;
      case '--json':
        format = 'json';
        index += 1;
        continue;
      case '--pretty':
        format = 'pretty';
        index += 1;
        continue;
      case '--color':
        colorPreference = true;
        index += 1;
        continue;
      case '--no-color':
        colorPreference = false;
        index += 1;
        continue;
      case '--verbose':
        options.verbose = true;
        index += 1;
        continue;
      case '--batch':
        batch = true;
        index += 1;
        continue;
      default:
        break;
    }

    if (flag === '--tld') {
      const { value, nextIndex } = readValue(argv, index, inlineValue, flag);
      tld = value;
      index = nextIndex;
      continue;
    }

    if (isNumericFlag(flag)) {
      const { value, nextIndex } = readValue(argv, index, inlineValue, flag);
      try {
        options[NUMERIC_FLAGS[flag]] = parsePositiveInt(`Option '${flag}'`, value);
      } catch (err) {
        if (err instanceof ConfigError) throw new CliError(err.message);
        throw err;
      }
      index = nextIndex;
      continue;
    }

    if (arg.startsWith('-')) {
      throw new CliError(`Unknown option '${arg}'`);
    }

    domains.push(arg);
    index += 1;
  }

  return { options, domains, tld, format, batch, colorPreference, showHelp, showVersion };
}

const RESET = '\u001B[0m';
const STATUS_COLORS: Record<string, string> = {
  available: '\u001B[32m',
  taken: '\u001B[31m',
  invalid: '\u001B[33m',
};

const STATUS_ICONS: Record<string, string> = {
  available: '🟢',
  taken: '🔴',
  invalid: '⚠️',
};

function colorize(text: string, colorCode: string, enabled: boolean): string {
  if (!enabled || !colorCode) return text;
  return `${colorCode}${text}${RESET}`;
}

export function formatPretty(res: Verdict, useColor: boolean): string {
  const icon = STATUS_ICONS[res.status] ?? '•';
  const statusText = colorize(res.status, STATUS_COLORS[res.status] ?? '', useColor);
  const cached = res.fromCache ? ' [cached]' : '';
  return `${icon} ${res.domain} -> ${statusText} (whois: ${res.whois.status}, dns: ${res.dns.status}) in ${Math.round(res.responseTime)}ms${cached}`;
}

export function formatPrettyError(error: BatchError, useColor: boolean): string {
  const statusText = colorize('invalid', STATUS_COLORS.invalid, useColor);
  return `${STATUS_ICONS.invalid} ${error.input} -> ${statusText} error(${error.code}): ${error.reason}`;
}

function helpText(): string {
  return (
    `domainprobe v${version}\n\n` +
    'Usage: domainprobe [options] <domain...>\n\n' +
    'Checks whether domain names are registered by combining a WHOIS lookup with a DNS probe.\n' +
    'Each domain is either a bare name (checked under --tld) or name.tld.\n\n' +
    'Options:\n' +
    '  -h, --help                 Show this help message\n' +
    '  -v, --version              Print the installed version\n' +
    '      --tld <tld>            TLD for bare names (default com)\n' +
    '      --json                 Output newline-delimited JSON objects\n' +
    '      --pretty               Force pretty text output (default)\n' +
    '      --color / --no-color   Force enable or disable ANSI colors\n' +
    '      --batch                Check all domains as one batch request\n' +
    '      --max-items <n>        Largest accepted batch (default 10)\n' +
    '      --concurrency <n>      Domains checked at once\n' +
    '      --whois-timeout <ms>   WHOIS deadline (default 5000)\n' +
    '      --dns-timeout <ms>     DNS deadline (default 3000)\n' +
    '      --cache-ttl <ms>       How long verdicts stay cached (default 300000)\n' +
    '      --verbose              Emit resolution logs to stderr\n' +
    '\nEnvironment variables:\n' +
    '  DOMAINPROBE_WHOIS_TIMEOUT, DOMAINPROBE_DNS_TIMEOUT, DOMAINPROBE_CACHE_TTL, DOMAINPROBE_MAX_BATCH\n' +
    '  provide defaults when the corresponding flags are omitted.\n'
  );
}

function consoleFor(out: Output): ConsoleLike {
  const write = (...args: unknown[]) => {
    out.write(`${formatArgs(...args)}\n`);
  };
  return { log: write, warn: write, error: write, debug: write };
}

/**
 * Runs the command line and resolves with the process exit code.
 */
export async function run(argv: string[], io: CliIo): Promise<number> {
  let parsed: ParsedCliArgs;
  let envConfig: CheckerOptions;
  try {
    parsed = parseArgs(argv);
    envConfig = loadConfig(io.env);
  } catch (err) {
    if (err instanceof CliError || err instanceof ConfigError) {
      io.stderr.write(`domainprobe: ${err.message}\n`);
      return 1;
    }
    throw err;
  }

  if (parsed.showHelp) {
    io.stdout.write(helpText());
    return 0;
  }

  if (parsed.showVersion) {
    io.stdout.write(`${version}\n`);
    return 0;
  }

  if (!parsed.domains.length) {
    io.stderr.write('domainprobe: no domains provided.\n');
    io.stderr.write(helpText());
    return 1;
  }

  const options: CheckerOptions = { ...envConfig, ...parsed.options };
  if (options.verbose) {
    options.logger = new DefaultLogger(consoleFor(io.stderr));
  }
  const checker = (io.createChecker ?? createDomainChecker)(options);
  const items: BatchItem[] = parsed.domains.map(splitDomainName);

  const defaultColor = Boolean(io.isTTY) && !('NO_COLOR' in io.env);
  const useColor = parsed.format === 'json' ? false : parsed.colorPreference ?? defaultColor;

  if (parsed.batch) {
    try {
      const outcome = await checker.checkBatch(items, parsed.tld);
      if (parsed.format === 'json') {
        io.stdout.write(`${JSON.stringify(toBatchBody(outcome))}\n`);
      } else {
        for (const res of outcome.results) io.stdout.write(`${formatPretty(res, useColor)}\n`);
        for (const error of outcome.errors) io.stdout.write(`${formatPrettyError(error, useColor)}\n`);
      }
      return outcome.errors.length ? 1 : 0;
    } catch (err) {
      if (err instanceof DomainCheckError) {
        const { body } = toErrorBody(err);
        io.stderr.write(parsed.format === 'json' ? `${JSON.stringify(body)}\n` : `domainprobe: ${err.message}\n`);
        return 1;
      }
      throw err;
    }
  }

  let exitCode = 0;
  for await (const res of checker.checkStream(items, parsed.tld)) {
    if ('verdict' in res) {
      io.stdout.write(
        parsed.format === 'json'
          ? `${JSON.stringify(toVerdictBody(res.verdict))}\n`
          : `${formatPretty(res.verdict, useColor)}\n`,
      );
    } else {
      exitCode = 1;
      io.stdout.write(
        parsed.format === 'json'
          ? `${JSON.stringify(toItemErrorBody(res.error))}\n`
          : `${formatPrettyError(res.error, useColor)}\n`,
      );
    }
  }
  return exitCode;
}
