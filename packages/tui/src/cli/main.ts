import {
  CLIENT_INFO,
  ConfigurationError,
  CorruptStateError,
  NavState,
  NotConfiguredError,
  PickerError,
  SHUTDOWN_TIMEOUT,
  type MediaLibrary,
  type PlayEventData,
  type PlaybackEndEventData,
} from '@jellyfzf/shared';
import {
  FileRegistryStorage,
  JellyfinClient,
  ServerRegistry,
  loadConfig,
  logger,
  type AppConfig,
  type RegistryStorage,
} from '@jellyfzf/core';
import { FzfPicker } from '../picker/fzfPicker.js';
import { BlessedPicker } from '../picker/blessedPicker.js';
import type { Picker } from '../picker/types.js';
import { BlessedPrompter, type Prompter } from '../tui/prompts.js';
import { TerminalNotifier, type Notifier } from '../tui/notifier.js';
import { PlaybackLauncher } from '../playback/launcher.js';
import { NavigationController } from '../navigation/controller.js';
import { createSession, selectServer, type Session } from '../navigation/session.js';
import { formatServerLabel } from '../tui/utils/formatters.js';
import { stripAnsi } from '../utils/ansi.js';
import { USAGE, UsageError, parseCliArgs, type CliCommand, type CliOptions } from './args.js';

const COMPONENT = 'CLI';

export const ExitCode = {
  OK: 0,
  FAILURE: 1,
  USAGE: 2,
} as const;

type ShutdownSignal = 'SIGINT' | 'SIGTERM';

export interface SignalSource {
  on(event: ShutdownSignal, listener: () => void): unknown;
  off(event: ShutdownSignal, listener: () => void): unknown;
}

export interface CliDependencies {
  env: NodeJS.ProcessEnv;
  /** stdout 한 줄 출력 */
  print: (line: string) => void;
  /** --list 출력에 색상 사용 여부 */
  color: boolean;
  notifier: Notifier;
  signals: SignalSource;
  exit: (code: number) => void;
  createStorage: (config: AppConfig) => RegistryStorage;
  createLibrary: (config: AppConfig) => MediaLibrary;
  createPicker: (config: AppConfig) => Picker;
  createPrompter: () => Prompter;
  createLauncher: (config: AppConfig) => PlaybackLauncher;
}

function defaultDependencies(): CliDependencies {
  return {
    env: process.env,
    print: line => {
      process.stdout.write(`${line}\n`);
    },
    color: Boolean(process.stdout.isTTY) && !process.env.NO_COLOR,
    notifier: new TerminalNotifier(),
    signals: process,
    exit: code => process.exit(code),
    createStorage: config => new FileRegistryStorage(config.registryPath),
    createLibrary: config => new JellyfinClient({
      requestTimeoutMs: config.requestTimeoutMs,
      forceTranscode: config.forceTranscode,
      transcodeBitrate: config.transcodeBitrate,
    }),
    createPicker: config => config.picker === 'embedded'
      ? new BlessedPicker()
      : new FzfPicker({ bin: config.fzfBin }),
    createPrompter: () => new BlessedPrompter(),
    createLauncher: config => new PlaybackLauncher({ player: config.player }),
  };
}

/**
 * 종료 처리: 재생 중이면 플레이어를 멈춘 뒤 종료, 제한 시간이 지나면 강제 종료
 */
export function createShutdown(launcher: PlaybackLauncher, exit: (code: number) => void): (exitCode: number) => void {
  let isShuttingDown = false;

  return (exitCode: number) => {
    if (isShuttingDown) return;
    isShuttingDown = true;

    if (!launcher.isPlaying) {
      exit(exitCode);
      return;
    }

    const forceExitTimer = setTimeout(() => {
      logger.error(COMPONENT, 'Shutdown timeout - forcing exit');
      exit(exitCode);
    }, SHUTDOWN_TIMEOUT);
    forceExitTimer.unref();

    launcher.once('ended', () => {
      clearTimeout(forceExitTimer);
      exit(exitCode);
    });
    launcher.interrupt();
  };
}

/**
 * 탐색 시작 지점 결정
 * --server는 그 서버의 앨범 목록, --search만 있으면 활성 서버, 아무것도 없으면 서버 선택
 */
async function openSession(
  registry: ServerRegistry,
  command: Extract<CliCommand, { kind: 'browse' }>
): Promise<Session> {
  if (command.server !== undefined) {
    const server = registry.get(command.server);
    if (!server) {
      throw new NotConfiguredError(`Server "${command.server}" is not registered`);
    }
    await registry.setActive(server.name);
    return createSession(server, command.search);
  }

  if (command.search !== undefined) {
    return createSession(registry.getActive(), command.search);
  }

  if (registry.size === 0) {
    throw new NotConfiguredError();
  }
  return createSession();
}

/**
 * jellyfzf 명령 실행, 종료 코드 반환
 */
export async function runCli(argv: string[], overrides: Partial<CliDependencies> = {}): Promise<number> {
  const deps: CliDependencies = { ...defaultDependencies(), ...overrides };
  const { notifier, print } = deps;

  let options: CliOptions;
  try {
    options = parseCliArgs(argv);
  } catch (error: unknown) {
    if (error instanceof UsageError) {
      notifier.error(error.message);
      notifier.info('Run "jellyfzf --help" for usage.');
      return ExitCode.USAGE;
    }
    throw error;
  }

  const { command } = options;
  if (command.kind === 'help') {
    print(USAGE);
    return ExitCode.OK;
  }
  if (command.kind === 'version') {
    print(`${CLIENT_INFO.client} ${CLIENT_INFO.version}`);
    return ExitCode.OK;
  }

  let config: AppConfig;
  try {
    config = loadConfig(deps.env, { picker: options.picker, player: options.player });
  } catch (error: unknown) {
    if (error instanceof ConfigurationError) {
      notifier.error(error.message);
      return ExitCode.FAILURE;
    }
    throw error;
  }
  logger.setLevel(config.logLevel);

  const registry = new ServerRegistry(deps.createStorage(config));

  if (command.kind === 'reset') {
    const movedTo = await registry.reset();
    if (movedTo) {
      notifier.success(`Server list moved to ${movedTo}`);
    } else {
      notifier.info(`No server list at ${registry.location}`);
    }
    return ExitCode.OK;
  }

  try {
    await registry.load();
  } catch (error: unknown) {
    if (error instanceof CorruptStateError) {
      notifier.error(`${error.message} (${registry.location})`);
      notifier.info('Run "jellyfzf --reset" to move it aside and start with an empty list.');
      return ExitCode.FAILURE;
    }
    throw error;
  }

  if (command.kind === 'list') {
    const servers = registry.list();
    if (servers.length === 0) {
      notifier.warn('No servers registered. Run "jellyfzf --add" to add one.');
      return ExitCode.OK;
    }
    const activeName = registry.getActiveName();
    for (const server of servers) {
      const label = formatServerLabel(server, server.name === activeName);
      print(deps.color ? label : stripAnsi(label));
    }
    return ExitCode.OK;
  }

  if (command.kind === 'remove') {
    if (await registry.remove(command.name)) {
      notifier.success(`Server "${command.name}" removed`);
      return ExitCode.OK;
    }
    notifier.error(`Server "${command.name}" is not registered`);
    return ExitCode.USAGE;
  }

  let session: Session | null = null;
  if (command.kind === 'browse') {
    try {
      session = await openSession(registry, command);
    } catch (error: unknown) {
      if (error instanceof NotConfiguredError) {
        notifier.error(error.message);
        notifier.info('Run "jellyfzf --add" to add a server.');
        return ExitCode.USAGE;
      }
      throw error;
    }
  }

  const launcher = deps.createLauncher(config);
  launcher.on('play', (data: PlayEventData) => {
    logger.debug(COMPONENT, 'Player started', {
      song: data.song?.id,
      container: data.descriptor.container,
      transcoded: data.descriptor.transcoded,
    });
  });
  launcher.on('ended', (data: PlaybackEndEventData) => {
    logger.debug(COMPONENT, 'Player ended', {
      song: data.song?.id,
      outcome: data.result.outcome,
      exitCode: data.result.exitCode,
      signal: data.result.signal,
    });
  });

  const controller = new NavigationController({
    registry,
    library: deps.createLibrary(config),
    picker: deps.createPicker(config),
    prompter: deps.createPrompter(),
    player: launcher,
    notifier,
  });

  // Ctrl-C는 재생 중이면 현재 곡만 멈춘다
  const shutdown = createShutdown(launcher, deps.exit);
  const onInterrupt = () => {
    if (launcher.interrupt()) {
      logger.debug(COMPONENT, 'Playback interrupted by SIGINT');
      return;
    }
    shutdown(ExitCode.OK);
  };
  const onTerminate = () => shutdown(ExitCode.OK);
  deps.signals.on('SIGINT', onInterrupt);
  deps.signals.on('SIGTERM', onTerminate);

  try {
    if (!session) {
      const added = await controller.addServer();
      if (!added) {
        return ExitCode.FAILURE;
      }
      if (added.saved) {
        return ExitCode.OK;
      }
      // 저장하지 않은 서버는 바로 탐색
      const temporary = createSession();
      selectServer(temporary, added.server, true);
      await controller.run(temporary, NavState.ALBUM_SELECT);
      return ExitCode.OK;
    }
    await controller.run(session);
    return ExitCode.OK;
  } catch (error: unknown) {
    if (error instanceof PickerError) {
      notifier.error(error.message);
      return ExitCode.FAILURE;
    }
    throw error;
  } finally {
    deps.signals.off('SIGINT', onInterrupt);
    deps.signals.off('SIGTERM', onTerminate);
  }
}
