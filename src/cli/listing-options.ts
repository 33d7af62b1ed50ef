import { loadConfig, resolveDefaultFolded, resolveListing, type Config } from '../config/loader.js';
import { CliUsageError } from './errors.js';

/** `value` takes the next token, `repeatable` collects one per occurrence. */
export type FlagKind = 'switch' | 'value' | 'repeatable';
export type FlagTable = Readonly<Record<string, FlagKind>>;

export const LISTING_FLAGS = {
  '--config': 'value',
  '-c': 'value',
  '--folded': 'switch',
  '--unfolded': 'switch',
  '--fold-unread': 'switch',
} as const satisfies FlagTable;

export const LIST_FLAGS = {
  ...LISTING_FLAGS,
  '--fold': 'repeatable',
  '--unfold': 'repeatable',
  '--mark': 'repeatable',
} as const satisfies FlagTable;

export const THREADS_FLAGS = {
  ...LISTING_FLAGS,
  '--json': 'switch',
} as const satisfies FlagTable;

export interface ParsedFlags {
  positionals: string[];
  switches: Set<string>;
  values: Map<string, string>;
  repeated: Map<string, string[]>;
}

export function parseFlags(args: readonly string[], table: FlagTable): ParsedFlags {
  const parsed: ParsedFlags = { positionals: [], switches: new Set(), values: new Map(), repeated: new Map() };

  let index = 0;
  while (index < args.length) {
    const token = args[index];
    index += 1;
    if (token === undefined) continue;

    const kind = table[token];
    if (kind === undefined) {
      if (token.startsWith('-')) {
        throw new CliUsageError(`Unknown flag: '${token}'`);
      }
      parsed.positionals.push(token);
      continue;
    }
    if (kind === 'switch') {
      parsed.switches.add(token);
      continue;
    }

    const value = args[index];
    if (value === undefined) {
      throw new CliUsageError(`Flag '${token}' requires a value.`);
    }
    index += 1;
    if (kind === 'value') {
      parsed.values.set(token, value);
    } else {
      parsed.repeated.set(token, [...(parsed.repeated.get(token) ?? []), value]);
    }
  }
  return parsed;
}

export interface ListingOptions {
  listingPath: string;
  config: Config;
  foldUnread: boolean;
  defaultFolded: boolean;
  flags: ParsedFlags;
}

/**
 * Parses a listing command's arguments against `table`, which must include
 * {@link LISTING_FLAGS}, and resolves them against the config.
 */
export function parseListingOptions(args: readonly string[], table: FlagTable = LISTING_FLAGS): ListingOptions {
  const flags = parseFlags(args, table);

  const folded = flags.switches.has('--folded');
  const unfolded = flags.switches.has('--unfolded');
  if (folded && unfolded) {
    throw new CliUsageError("Use either '--folded' or '--unfolded', not both.");
  }
  if (flags.positionals.length > 1) {
    throw new CliUsageError(`Expected at most one listing file, got: ${flags.positionals.join(' ')}`);
  }

  const config = loadConfig(flags.values.get('--config') ?? flags.values.get('-c'));
  return {
    listingPath: resolveListing(config, flags.positionals[0]),
    config,
    foldUnread: flags.switches.has('--fold-unread') || config.foldUnread,
    defaultFolded: resolveDefaultFolded(config, { folded, unfolded }),
    flags,
  };
}
