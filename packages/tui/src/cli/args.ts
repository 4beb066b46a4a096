import { parseArgs } from 'util';
import { AppError } from '@jellyfzf/shared';
import type { PickerKind } from '@jellyfzf/core';

/**
 * 잘못된 명령행 사용 (종료 코드 2)
 */
export class UsageError extends AppError {
  constructor(message: string, options?: { cause?: Error }) {
    super(message, 'USAGE_ERROR', { cause: options?.cause, isOperational: true });
    this.name = 'UsageError';
  }
}

export type CliCommand =
  | { kind: 'browse'; server?: string; search?: string }
  | { kind: 'add' }
  | { kind: 'list' }
  | { kind: 'remove'; name: string }
  | { kind: 'reset' }
  | { kind: 'help' }
  | { kind: 'version' };

export interface CliOptions {
  command: CliCommand;
  picker?: PickerKind;
  player?: string;
}

const OPTIONS = {
  server: { type: 'string', short: 's' },
  search: { type: 'string', short: 'q' },
  add: { type: 'boolean', short: 'a' },
  list: { type: 'boolean', short: 'l' },
  remove: { type: 'string', short: 'r' },
  reset: { type: 'boolean' },
  picker: { type: 'string' },
  player: { type: 'string' },
  help: { type: 'boolean', short: 'h' },
  version: { type: 'boolean', short: 'v' },
} as const;

export const USAGE = `Usage: jellyfzf [options]

Browse a Jellyfin music library with fzf and play tracks with an external player.

Options:
  -s, --server <name>    Browse this server's albums right away
  -q, --search <term>    Start with an album search (title, artist or genre)
  -a, --add              Add a server (asks for URL, username and password)
  -l, --list             List registered servers
  -r, --remove <name>    Remove a server
      --reset            Move an unreadable server list aside and start empty
      --picker <kind>    Menu to use: fzf (default) or embedded
      --player <cmd>     Player command (default: ffplay)
  -h, --help             Show this help
  -v, --version          Show version

Environment: JELLYFZF_CONFIG_DIR, JELLYFZF_PICKER, JELLYFZF_FZF_BIN, JELLYFZF_PLAYER,
JELLYFZF_REQUEST_TIMEOUT_MS, JELLYFZF_FORCE_TRANSCODE, JELLYFZF_TRANSCODE_BITRATE, LOG_LEVEL`;

function isPickerKind(value: string): value is PickerKind {
  return value === 'fzf' || value === 'embedded';
}

function readFlags(argv: string[]) {
  try {
    return parseArgs({ args: argv, options: OPTIONS, strict: true, allowPositionals: false }).values;
  } catch (error: unknown) {
    throw new UsageError(error instanceof Error ? error.message : String(error), {
      cause: error instanceof Error ? error : undefined,
    });
  }
}

/**
 * 명령행 인자 해석
 */
export function parseCliArgs(argv: string[]): CliOptions {
  const values = readFlags(argv);

  let picker: PickerKind | undefined;
  if (values.picker !== undefined) {
    if (!isPickerKind(values.picker)) {
      throw new UsageError(`--picker must be "fzf" or "embedded", got "${values.picker}"`);
    }
    picker = values.picker;
  }

  if (values.player !== undefined && !values.player.trim()) {
    throw new UsageError('--player must not be empty');
  }

  const options = { picker, player: values.player };

  if (values.help) return { ...options, command: { kind: 'help' } };
  if (values.version) return { ...options, command: { kind: 'version' } };

  const actions = [values.add, values.list, values.remove !== undefined, values.reset].filter(Boolean).length;
  if (actions > 1) {
    throw new UsageError('Use only one of --add, --list, --remove and --reset');
  }
  if (actions === 1 && (values.server !== undefined || values.search !== undefined)) {
    throw new UsageError('--server and --search only apply when browsing');
  }

  if (values.add) return { ...options, command: { kind: 'add' } };
  if (values.list) return { ...options, command: { kind: 'list' } };
  if (values.reset) return { ...options, command: { kind: 'reset' } };
  if (values.remove !== undefined) {
    if (!values.remove.trim()) {
      throw new UsageError('--remove needs a server name');
    }
    return { ...options, command: { kind: 'remove', name: values.remove.trim() } };
  }

  if (values.server !== undefined && !values.server.trim()) {
    throw new UsageError('--server needs a server name');
  }

  return {
    ...options,
    command: {
      kind: 'browse',
      server: values.server?.trim(),
      search: values.search?.trim() || undefined,
    },
  };
}
