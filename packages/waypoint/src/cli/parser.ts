/**
 * CLI argument parser.
 * Hand-rolled over process.argv; the command set is small enough.
 */

import type { Command, ParseError, OutputFormat } from '../types.ts';
import { ok, err } from '../result.ts';
import type { Result } from '../types.ts';

const VALID_FORMATS: readonly OutputFormat[] = ['json', 'markdown'];

const isValidFormat = (value: string): value is OutputFormat =>
  VALID_FORMATS.some((format) => format === value);

type Flags = Record<string, string | true>;

interface ParsedFlags {
  readonly positional: readonly string[];
  readonly flags: Flags;
}

const parseFlags = (args: readonly string[]): ParsedFlags => {
  const positional: string[] = [];
  const flags: Flags = {};

  let i = 0;
  while (i < args.length) {
    const arg = args[i];
    if (arg === undefined) {
      i++;
      continue;
    }

    const key = arg.startsWith('--') ? arg.slice(2) : arg.startsWith('-') && arg.length === 2 ? arg.slice(1) : null;
    if (key === null) {
      positional.push(arg);
      i++;
      continue;
    }

    const next = args[i + 1];
    if (next !== undefined && !next.startsWith('-')) {
      flags[key] = next;
      i += 2;
    } else {
      flags[key] = true;
      i++;
    }
  }

  return { positional, flags };
};

const getFlag = (flags: Flags, ...keys: readonly string[]): string | null => {
  for (const key of keys) {
    const value = flags[key];
    if (typeof value === 'string') return value;
  }
  return null;
};

const hasFlag = (flags: Flags, ...keys: readonly string[]): boolean =>
  keys.some((key) => key in flags);

const missing = (arg: string, message: string): Result<never, ParseError> =>
  err({ code: 'MISSING_REQUIRED_ARG', message, arg });

const getFormat = (flags: Flags, defaultFormat: OutputFormat = 'json'): Result<OutputFormat, ParseError> => {
  const format = getFlag(flags, 'format', 'f');
  if (format === null) return ok(defaultFormat);
  if (isValidFormat(format)) return ok(format);
  return err({
    code: 'INVALID_ARG_VALUE',
    message: `Invalid format: "${format}". Must be one of: ${VALID_FORMATS.join(', ')}`,
    arg: 'format',
  });
};

const getBaseUrl = (flags: Flags): Result<string, ParseError> => {
  const baseUrl = getFlag(flags, 'base-url', 'u');
  if (baseUrl === null) {
    return missing('base-url', 'Missing required option: --base-url');
  }
  if (!URL.canParse(baseUrl)) {
    return err({
      code: 'INVALID_ARG_VALUE',
      message: `Invalid base URL: "${baseUrl}"`,
      arg: 'base-url',
    });
  }
  return ok(baseUrl);
};

const parseValidate = (positional: readonly string[]): Result<Command, ParseError> => {
  const graphFile = positional[1];
  if (graphFile === undefined) {
    return missing('graph-file', 'Missing required argument: <graph-file>');
  }
  return ok({ command: 'validate', graphFile });
};

const parseRoute = (positional: readonly string[], flags: Flags): Result<Command, ParseError> => {
  const graphFile = positional[1];
  if (graphFile === undefined) {
    return missing('graph-file', 'Missing required argument: <graph-file>');
  }

  const to = getFlag(flags, 'to', 't');
  if (to === null) {
    return missing('to', 'Missing required option: --to');
  }

  return ok({
    command: 'route',
    graphFile,
    from: getFlag(flags, 'from'),
    to,
  });
};

const parseWalk = (positional: readonly string[], flags: Flags): Result<Command, ParseError> => {
  const graphFile = positional[1];
  if (graphFile === undefined) {
    return missing('graph-file', 'Missing required argument: <graph-file>');
  }

  const baseUrlResult = getBaseUrl(flags);
  if (!baseUrlResult.ok) return baseUrlResult;

  const formatResult = getFormat(flags);
  if (!formatResult.ok) return formatResult;

  return ok({
    command: 'walk',
    graphFile,
    baseUrl: baseUrlResult.value,
    device: getFlag(flags, 'device', 'd') ?? 'desktop',
    output: getFlag(flags, 'output', 'o'),
    format: formatResult.value,
  });
};

export const parse = (argv: readonly string[]): Result<Command, ParseError> => {
  // Skip the node executable and script path
  const args = argv.slice(2);
  const { positional, flags } = parseFlags(args);

  if (hasFlag(flags, 'version', 'v')) {
    return ok({ command: 'version' });
  }

  if (hasFlag(flags, 'help', 'h')) {
    return ok({ command: 'help', subcommand: positional[0] ?? null });
  }

  const command = positional[0];

  if (command === undefined) {
    return ok({ command: 'help', subcommand: null });
  }

  switch (command) {
    case 'validate':
      return parseValidate(positional);
    case 'route':
      return parseRoute(positional, flags);
    case 'walk':
      return parseWalk(positional, flags);
    case 'list':
      return ok({ command: 'list', dir: positional[1] ?? null });
    case 'version':
      return ok({ command: 'version' });
    case 'help':
      return ok({ command: 'help', subcommand: positional[1] ?? null });
    default:
      return err({
        code: 'UNKNOWN_COMMAND',
        message: `Unknown command: "${command}"`,
        arg: command,
      });
  }
};
