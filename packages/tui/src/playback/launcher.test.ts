import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { EventEmitter } from 'events';
import { PlaybackFailedError, type Song, type StreamDescriptor } from '@jellyfzf/shared';
import { PlaybackLauncher, buildPlayerCommand } from './launcher.js';
import type { SpawnFn, SpawnedProcess } from '../utils/process.js';

class FakePlayer extends EventEmitter implements SpawnedProcess {
  readonly stdin = null;
  readonly stdout = null;
  readonly kill = vi.fn((_signal?: NodeJS.Signals | number) => true);

  exit(code: number | null, signal: NodeJS.Signals | null = null): void {
    this.emit('close', code, signal);
  }
}

const descriptor: StreamDescriptor = {
  url: 'http://jf.lan/Audio/s1/stream?static=true&api_key=test-token',
  container: 'flac',
  codec: null,
  transcoded: false,
};

const song: Song = {
  id: 's1',
  title: 'Come Together',
  albumId: 'a1',
  artists: ['The Beatles'],
  trackNumber: 1,
  discNumber: 1,
  durationSeconds: 259,
};

function setup(player = 'ffplay', platform: NodeJS.Platform = 'linux') {
  const fake = new FakePlayer();
  const spawn = vi.fn<SpawnFn>(() => fake);
  const launcher = new PlaybackLauncher({ player, spawn, killTimeoutMs: 50, platform });
  return { fake, spawn, launcher };
}

describe('buildPlayerCommand', () => {
  it('should use ffplay presets when no arguments are given', () => {
    expect(buildPlayerCommand('ffplay', 'http://x')).toEqual({
      cmd: 'ffplay',
      args: ['-nodisp', '-autoexit', '-loglevel', 'quiet', 'http://x'],
    });
  });

  it('should recognise mpv by basename', () => {
    expect(buildPlayerCommand('/usr/bin/mpv', 'http://x')).toEqual({
      cmd: '/usr/bin/mpv',
      args: ['--no-video', '--really-quiet', 'http://x'],
    });
  });

  it('should keep user arguments as given', () => {
    expect(buildPlayerCommand('mpv --volume=50', 'http://x')).toEqual({ cmd: 'mpv', args: ['--volume=50', 'http://x'] });
    expect(buildPlayerCommand('vlc -I dummy', 'http://x')).toEqual({ cmd: 'vlc', args: ['-I', 'dummy', 'http://x'] });
  });

  it('should reject an empty command', () => {
    expect(() => buildPlayerCommand('  ', 'http://x')).toThrow(PlaybackFailedError);
  });
});

describe('PlaybackLauncher', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it('should report completedNormally on exit code 0', async () => {
    const { fake, spawn, launcher } = setup();
    const ended = vi.fn();
    launcher.on('ended', ended);

    const pending = launcher.play(descriptor, song);
    expect(launcher.isPlaying).toBe(true);
    fake.exit(0);

    await expect(pending).resolves.toEqual({ outcome: 'completedNormally', exitCode: 0, signal: null });
    expect(launcher.isPlaying).toBe(false);
    expect(spawn).toHaveBeenCalledWith(
      'ffplay',
      ['-nodisp', '-autoexit', '-loglevel', 'quiet', descriptor.url],
      { stdio: ['ignore', 'inherit', 'inherit'] }
    );
    expect(ended).toHaveBeenCalledWith({ song, result: { outcome: 'completedNormally', exitCode: 0, signal: null } });
  });

  it('should emit play with the song and descriptor', () => {
    const { fake, launcher } = setup();
    const play = vi.fn();
    launcher.on('play', play);

    void launcher.play(descriptor, song);
    expect(play).toHaveBeenCalledWith({ song, descriptor });
    fake.exit(0);
  });

  it.each([130, 143])('should treat exit code %i as interrupted', async (code) => {
    const { fake, launcher } = setup();
    const pending = launcher.play(descriptor, song);
    fake.exit(code);
    await expect(pending).resolves.toMatchObject({ outcome: 'interrupted', exitCode: code });
  });

  it('should treat ffplay exit code 123 as interrupted', async () => {
    const { fake, launcher } = setup();
    const pending = launcher.play(descriptor, song);
    fake.exit(123);
    await expect(pending).resolves.toEqual({ outcome: 'interrupted', exitCode: 123, signal: null });
  });

  it('should use the interrupt exit codes of the configured player', () => {
    const mpv = new PlaybackLauncher({ player: '/usr/bin/mpv --volume=50' });
    expect(mpv.classifyExit(4, null).outcome).toBe('interrupted');

    const result = mpv.classifyExit(123, null);
    expect(result.outcome).toBe('failed');
    expect(result.error?.message).toBe('Player exited with code 123');
  });

  it('should treat a terminating signal as interrupted', async () => {
    const { fake, launcher } = setup();
    const pending = launcher.play(descriptor, song);
    fake.exit(null, 'SIGINT');
    await expect(pending).resolves.toEqual({ outcome: 'interrupted', exitCode: null, signal: 'SIGINT' });
  });

  it('should report failed with PlaybackFailedError on other exit codes', async () => {
    const { fake, launcher } = setup();
    const pending = launcher.play(descriptor, song);
    fake.exit(1);

    const result = await pending;
    expect(result.outcome).toBe('failed');
    expect(result.error).toBeInstanceOf(PlaybackFailedError);
    expect(result.error?.message).toBe('Player exited with code 1');
  });

  it('should report failed when the player binary is missing', async () => {
    const { fake, launcher } = setup();
    const pending = launcher.play(descriptor, song);
    fake.emit('error', Object.assign(new Error('spawn ffplay ENOENT'), { code: 'ENOENT' }));

    const result = await pending;
    expect(result).toMatchObject({ outcome: 'failed', exitCode: null, signal: null });
    expect(result.error?.message).toBe('Player "ffplay" was not found; install it or set --player');
  });

  it('should classify an interrupt request as interrupted even on exit code 0', async () => {
    const { fake, launcher } = setup();
    const pending = launcher.play(descriptor, song);

    expect(launcher.interrupt()).toBe(true);
    expect(fake.kill).toHaveBeenCalledWith('SIGTERM');
    fake.exit(0);

    await expect(pending).resolves.toMatchObject({ outcome: 'interrupted' });
  });

  it('should classify a skip request as skipped', async () => {
    const { fake, launcher } = setup();
    const pending = launcher.play(descriptor, song);

    expect(launcher.interrupt('next')).toBe(true);
    fake.exit(123);

    await expect(pending).resolves.toEqual({ outcome: 'skipped', exitCode: 123, signal: null });
  });

  it('should pause and resume the player with SIGSTOP and SIGCONT', async () => {
    const { fake, launcher } = setup();
    const paused = vi.fn();
    const resumed = vi.fn();
    launcher.on('pause', paused);
    launcher.on('resume', resumed);
    const pending = launcher.play(descriptor, song);

    expect(launcher.pause()).toBe(true);
    expect(launcher.isPaused).toBe(true);
    expect(fake.kill).toHaveBeenLastCalledWith('SIGSTOP');
    expect(launcher.pause()).toBe(false);

    expect(launcher.togglePause()).toBe(true);
    expect(launcher.isPaused).toBe(false);
    expect(fake.kill).toHaveBeenLastCalledWith('SIGCONT');
    expect(launcher.resume()).toBe(false);

    expect(paused).toHaveBeenCalledWith({ song });
    expect(resumed).toHaveBeenCalledWith({ song });
    fake.exit(0);
    await pending;
  });

  it('should continue a paused player when interrupting it', async () => {
    const { fake, launcher } = setup();
    const pending = launcher.play(descriptor, song);

    launcher.pause();
    launcher.interrupt();
    expect(fake.kill.mock.calls).toEqual([['SIGSTOP'], ['SIGTERM'], ['SIGCONT']]);
    expect(launcher.isPaused).toBe(false);

    fake.exit(null, 'SIGTERM');
    await expect(pending).resolves.toMatchObject({ outcome: 'interrupted' });
  });

  it('should not pause on Windows or when idle', async () => {
    expect(setup().launcher.pause()).toBe(false);

    const { fake, launcher } = setup('ffplay', 'win32');
    const pending = launcher.play(descriptor, song);
    expect(launcher.pause()).toBe(false);
    expect(fake.kill).not.toHaveBeenCalled();
    fake.exit(0);
    await pending;
  });

  it('should escalate to SIGKILL when the player ignores SIGTERM', async () => {
    vi.useFakeTimers();
    const { fake, launcher } = setup();
    const pending = launcher.play(descriptor, song);

    launcher.interrupt();
    vi.advanceTimersByTime(50);
    expect(fake.kill).toHaveBeenLastCalledWith('SIGKILL');

    fake.exit(null, 'SIGKILL');
    await expect(pending).resolves.toMatchObject({ outcome: 'interrupted', signal: 'SIGKILL' });
  });

  it('should return false from interrupt when idle', () => {
    const { launcher } = setup();
    expect(launcher.interrupt()).toBe(false);
  });

  it('should refuse overlapping playback', async () => {
    const { fake, launcher } = setup();
    const first = launcher.play(descriptor, song);
    await expect(launcher.play(descriptor, song)).rejects.toBeInstanceOf(PlaybackFailedError);
    fake.exit(0);
    await first;
  });
});
