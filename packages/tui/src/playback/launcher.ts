import { EventEmitter } from 'events';
import path from 'path';
import {
  PlaybackConfig,
  PlaybackFailedError,
  isNodeErrorWithCode,
  type PlaybackEndEventData,
  type PlaybackResult,
  type PlayEventData,
  type Song,
  type StreamDescriptor,
} from '@jellyfzf/shared';
import { logger } from '@jellyfzf/core';
import { defaultSpawn, splitCommand, type SpawnFn, type SpawnedProcess } from '../utils/process.js';

const COMPONENT = 'Player';

/** 인터럽트로 간주하는 종료 신호 */
const INTERRUPT_SIGNALS: readonly NodeJS.Signals[] = ['SIGINT', 'SIGTERM', 'SIGKILL', 'SIGHUP'];

interface PlayerPreset {
  /** 인자 없이 지정했을 때 쓰는 기본 인자 */
  args: string[];
  /** 신호를 받고 스스로 종료할 때의 종료 코드 */
  interruptExitCodes: number[];
}

const PLAYER_PRESETS: Record<string, PlayerPreset> = {
  // ffplay는 SIGINT/SIGTERM을 받으면 exit(123)
  ffplay: { args: ['-nodisp', '-autoexit', '-loglevel', 'quiet'], interruptExitCodes: [123] },
  // mpv: 4 = quit due to a signal
  mpv: { args: ['--no-video', '--really-quiet'], interruptExitCodes: [4] },
};

function presetFor(command: string): PlayerPreset | undefined {
  return PLAYER_PRESETS[path.basename(command)];
}

export interface PlayerCommand {
  cmd: string;
  args: string[];
}

/**
 * 플레이어 명령 구성
 * "ffplay" → ffplay -nodisp -autoexit -loglevel quiet <url>
 * "mpv --volume=50" → mpv --volume=50 <url>
 */
export function buildPlayerCommand(player: string, url: string): PlayerCommand {
  const { command, args } = splitCommand(player);
  if (!command) {
    throw new PlaybackFailedError('No media player command configured');
  }
  const preset = presetFor(command);
  const baseArgs = args.length === 0 && preset ? preset.args : args;
  return { cmd: command, args: [...baseArgs, url] };
}

/**
 * 중지 이유: stop은 interrupted, next는 skipped로 분류
 */
export type InterruptReason = 'stop' | 'next';

/**
 * 스트림 재생 (NavigationController가 의존하는 부분)
 */
export interface StreamPlayer {
  play(descriptor: StreamDescriptor, song?: Song | null): Promise<PlaybackResult>;
  pause(): boolean;
  resume(): boolean;
  interrupt(reason?: InterruptReason): boolean;
}

export interface PlaybackLauncherOptions {
  player?: string;
  spawn?: SpawnFn;
  killTimeoutMs?: number;
  platform?: NodeJS.Platform;
}

/**
 * 외부 플레이어 프로세스 실행기
 *
 * 프로세스가 끝날 때까지 기다린 뒤 종료 상태를
 * completedNormally / interrupted / skipped / failed 로 분류한다.
 * 일시정지는 SIGSTOP/SIGCONT (Windows 미지원).
 *
 * Events: 'play' (PlayEventData), 'ended' (PlaybackEndEventData), 'pause', 'resume'
 */
export class PlaybackLauncher extends EventEmitter implements StreamPlayer {
  readonly player: string;
  private readonly spawnFn: SpawnFn;
  private readonly killTimeoutMs: number;
  private readonly platform: NodeJS.Platform;
  private currentProcess: SpawnedProcess | null = null;
  private interruptReason: InterruptReason | null = null;
  private paused = false;
  private currentSong: Song | null = null;
  private killTimer: ReturnType<typeof setTimeout> | null = null;

  constructor(options: PlaybackLauncherOptions = {}) {
    super();
    this.player = options.player ?? 'ffplay';
    this.spawnFn = options.spawn ?? defaultSpawn;
    this.killTimeoutMs = options.killTimeoutMs ?? PlaybackConfig.KILL_TIMEOUT;
    this.platform = options.platform ?? process.platform;
  }

  get isPlaying(): boolean {
    return this.currentProcess !== null;
  }

  get isPaused(): boolean {
    return this.paused;
  }

  async play(descriptor: StreamDescriptor, song: Song | null = null): Promise<PlaybackResult> {
    if (this.currentProcess) {
      throw new PlaybackFailedError('Playback already in progress', { songId: song?.id });
    }

    const { cmd, args } = buildPlayerCommand(this.player, descriptor.url);
    this.interruptReason = null;
    this.paused = false;

    return new Promise<PlaybackResult>((resolve) => {
      let settled = false;

      const settle = (result: PlaybackResult) => {
        if (settled) return;
        settled = true;
        this.currentProcess = null;
        this.currentSong = null;
        this.paused = false;
        this.clearKillTimer();
        const eventData: PlaybackEndEventData = { song, result };
        this.emit('ended', eventData);
        resolve(result);
      };

      let child: SpawnedProcess;
      try {
        // 키 입력은 재생 제어 메뉴가 받으므로 stdin은 넘기지 않는다
        child = this.spawnFn(cmd, args, { stdio: ['ignore', 'inherit', 'inherit'] });
      } catch (error: unknown) {
        settle(this.spawnFailure(cmd, error, song));
        return;
      }

      this.currentProcess = child;
      this.currentSong = song;
      const playData: PlayEventData = { song, descriptor };
      this.emit('play', playData);
      logger.debug(COMPONENT, 'Player started', { cmd, songId: song?.id, transcoded: descriptor.transcoded });

      child.once('error', (error: Error) => {
        settle(this.spawnFailure(cmd, error, song));
      });

      child.once('close', (code: number | null, signal: NodeJS.Signals | null) => {
        settle(this.classifyExit(code, signal, song));
      });
    });
  }

  pause(): boolean {
    const proc = this.currentProcess;
    if (!proc || this.paused || this.interruptReason !== null) {
      return false;
    }
    if (this.platform === 'win32') {
      logger.warn(COMPONENT, 'Pause is not supported on Windows');
      return false;
    }
    try {
      proc.kill('SIGSTOP');
    } catch (error: unknown) {
      // 이미 종료된 프로세스
      logger.debug(COMPONENT, 'SIGSTOP failed', { error: error instanceof Error ? error.message : String(error) });
      return false;
    }
    this.paused = true;
    this.emit('pause', { song: this.currentSong });
    return true;
  }

  resume(): boolean {
    const proc = this.currentProcess;
    if (!proc || !this.paused) {
      return false;
    }
    try {
      proc.kill('SIGCONT');
    } catch (error: unknown) {
      logger.debug(COMPONENT, 'SIGCONT failed', { error: error instanceof Error ? error.message : String(error) });
      return false;
    }
    this.paused = false;
    this.emit('resume', { song: this.currentSong });
    return true;
  }

  togglePause(): boolean {
    return this.paused ? this.resume() : this.pause();
  }

  /**
   * 재생 중인 플레이어 중지 (SIGTERM, 유예 시간 후 SIGKILL)
   *
   * @param reason - 'next'면 결과가 skipped
   * @returns 중지할 플레이어가 있었는지 여부
   */
  interrupt(reason: InterruptReason = 'stop'): boolean {
    const proc = this.currentProcess;
    if (!proc) {
      return false;
    }

    this.interruptReason = reason;
    try {
      proc.kill('SIGTERM');
      // 멈춘 프로세스는 SIGCONT를 받아야 SIGTERM을 처리한다
      if (this.paused) {
        proc.kill('SIGCONT');
        this.paused = false;
      }
    } catch (error: unknown) {
      logger.debug(COMPONENT, 'SIGTERM failed', { error: error instanceof Error ? error.message : String(error) });
    }

    if (!this.killTimer) {
      this.killTimer = setTimeout(() => {
        this.killTimer = null;
        if (this.currentProcess === proc) {
          logger.warn(COMPONENT, 'Player ignored SIGTERM, sending SIGKILL');
          proc.kill('SIGKILL');
        }
      }, this.killTimeoutMs);
    }
    return true;
  }

  classifyExit(code: number | null, signal: NodeJS.Signals | null, song: Song | null = null): PlaybackResult {
    if (this.interruptReason === 'next') {
      return { outcome: 'skipped', exitCode: code, signal };
    }
    if (this.interruptReason === 'stop') {
      return { outcome: 'interrupted', exitCode: code, signal };
    }
    if (signal !== null && INTERRUPT_SIGNALS.includes(signal)) {
      return { outcome: 'interrupted', exitCode: code, signal };
    }
    if (code === 0) {
      return { outcome: 'completedNormally', exitCode: code, signal };
    }
    const interruptCodes: readonly number[] = [
      ...PlaybackConfig.INTERRUPT_EXIT_CODES,
      ...(presetFor(splitCommand(this.player).command)?.interruptExitCodes ?? []),
    ];
    if (code !== null && interruptCodes.includes(code)) {
      return { outcome: 'interrupted', exitCode: code, signal };
    }

    const reason = signal !== null ? `was killed by ${signal}` : `exited with code ${code ?? 'null'}`;
    const error = new PlaybackFailedError(`Player ${reason}`, { exitCode: code, signal, songId: song?.id });
    logger.warn(COMPONENT, error.message, { songId: song?.id });
    return { outcome: 'failed', exitCode: code, signal, error };
  }

  private spawnFailure(cmd: string, cause: unknown, song: Song | null): PlaybackResult {
    const message = isNodeErrorWithCode(cause, 'ENOENT')
      ? `Player "${cmd}" was not found; install it or set --player`
      : `Failed to start player "${cmd}": ${cause instanceof Error ? cause.message : String(cause)}`;
    const error = new PlaybackFailedError(message, {
      cause: cause instanceof Error ? cause : undefined,
      songId: song?.id,
    });
    logger.warn(COMPONENT, message);
    return { outcome: 'failed', exitCode: null, signal: null, error };
  }

  private clearKillTimer(): void {
    if (this.killTimer) {
      clearTimeout(this.killTimer);
      this.killTimer = null;
    }
  }
}
