import {
  AuthFailedError,
  InvalidResponseError,
  NavState,
  NotConfiguredError,
  PlaybackFailedError,
  RegistryWriteError,
  ServerUnreachableError,
  isAppError,
  type Album,
  type MediaLibrary,
  type NavStateType,
  type PlaybackResult,
  type Server,
  type Song,
  type StreamDescriptor,
} from '@jellyfzf/shared';
import { logger, type ServerRegistry } from '@jellyfzf/core';
import type { Candidate, Picker } from '../picker/types.js';
import type { Prompter } from '../tui/prompts.js';
import type { Notifier } from '../tui/notifier.js';
import type { StreamPlayer } from '../playback/launcher.js';
import { paint } from '../utils/ansi.js';
import {
  formatAlbumLabel,
  formatNowPlaying,
  formatServerLabel,
  formatSongLabel,
} from '../tui/utils/formatters.js';
import { MenuLabel, MenuPrompt, type PlaybackCommand } from './menu.js';
import {
  clearSearch,
  clearServer,
  popFrame,
  pushAlbumFrame,
  pushSongFrame,
  selectServer,
  topFrame,
  type Session,
} from './session.js';

const COMPONENT = 'Navigation';

type ServerChoice = { kind: 'server'; server: Server } | { kind: 'add' };
type AlbumChoice = { kind: 'album'; album: Album } | { kind: 'search' } | { kind: 'clearSearch' };
type SongChoice = { kind: 'song'; song: Song } | { kind: 'playAll' };

/** addServer 결과: saved가 false면 이번 세션에서만 쓰는 서버 */
export interface AddedServer {
  server: Server;
  saved: boolean;
}

interface ControlledPlayback {
  result: PlaybackResult;
  /** 재생을 끝낸 제어 명령 (없으면 곡이 스스로 끝남) */
  command: PlaybackCommand | null;
}

export interface NavigationDependencies {
  registry: ServerRegistry;
  library: MediaLibrary;
  picker: Picker;
  prompter: Prompter;
  player: StreamPlayer;
  notifier: Notifier;
}

/**
 * 서버 → 앨범 → 곡 → 재생 탐색 상태 머신
 *
 * 각 단계는 Session을 받아 다음 상태를 돌려준다.
 * 선택 메뉴 취소는 Back, 복구 가능한 에러는 알림 후 상태 전이로 처리한다.
 */
export class NavigationController {
  private readonly registry: ServerRegistry;
  private readonly library: MediaLibrary;
  private readonly picker: Picker;
  private readonly prompter: Prompter;
  private readonly player: StreamPlayer;
  private readonly notifier: Notifier;

  constructor(deps: NavigationDependencies) {
    this.registry = deps.registry;
    this.library = deps.library;
    this.picker = deps.picker;
    this.prompter = deps.prompter;
    this.player = deps.player;
    this.notifier = deps.notifier;
  }

  async run(session: Session, initial?: NavStateType): Promise<void> {
    let state = initial ?? (session.server ? NavState.ALBUM_SELECT : NavState.SERVER_SELECT);
    while (state !== NavState.EXIT) {
      logger.debug(COMPONENT, 'Step', { state, depth: session.stack.length, server: session.server?.name });
      state = await this.step(session, state);
    }
  }

  async step(session: Session, state: NavStateType): Promise<NavStateType> {
    try {
      switch (state) {
        case NavState.SERVER_SELECT:
          return await this.serverSelect(session);
        case NavState.ALBUM_SELECT:
          return await this.albumSelect(session);
        case NavState.SONG_SELECT:
          return await this.songSelect(session);
        case NavState.PLAYING:
          return await this.playing(session);
        case NavState.EXIT:
          return NavState.EXIT;
      }
    } catch (error: unknown) {
      return this.recover(error, session, state);
    }
  }

  /**
   * 서버 추가: 입력 → 인증 → 저장 및 활성화
   * 저장하지 않기로 하면 레지스트리를 건드리지 않는다.
   * 인증/네트워크/저장 실패는 알림 후 null
   */
  async addServer(): Promise<AddedServer | null> {
    const input = await this.prompter.askServer();
    if (!input) {
      return null;
    }

    try {
      this.notifier.info(`Logging in to ${input.url}...`);
      const auth = await this.library.authenticate(input.url, input.username, input.password);
      const server: Server = {
        name: input.name,
        url: input.url,
        username: input.username,
        userId: auth.userId,
        accessToken: auth.accessToken,
      };
      if (!input.save) {
        this.notifier.info(`Using "${server.name}" for this session only`);
        return { server, saved: false };
      }
      const existed = this.registry.get(server.name) !== undefined;
      await this.registry.addOrUpdate(server);
      await this.registry.setActive(server.name);
      this.notifier.success(`Server "${server.name}" ${existed ? 'updated' : 'saved'} (${this.registry.location})`);
      return { server: this.registry.get(server.name) ?? server, saved: true };
    } catch (error: unknown) {
      if (isAppError(error) && error.isOperational) {
        this.notifier.error(`Could not add server: ${error.message}`);
        return null;
      }
      throw error;
    }
  }

  private async serverSelect(session: Session): Promise<NavStateType> {
    const servers = this.registry.list();
    if (servers.length === 0) {
      this.notifier.warn('No servers configured, please add one.');
      const added = await this.addServer();
      if (!added) {
        return NavState.EXIT;
      }
      selectServer(session, added.server, !added.saved);
      return NavState.ALBUM_SELECT;
    }

    const activeName = this.registry.getActiveName();
    const candidates: Candidate<ServerChoice>[] = [
      ...servers.map(server => ({
        label: formatServerLabel(server, server.name === activeName),
        value: { kind: 'server' as const, server },
      })),
      { label: paint(MenuLabel.ADD_SERVER, 'green', 'bold'), value: { kind: 'add' } },
    ];

    const result = await this.picker.choose(candidates, { prompt: MenuPrompt.SERVER });
    if (result.status === 'cancelled') {
      return NavState.EXIT;
    }

    const [choice] = result.values;
    if (!choice) {
      return NavState.SERVER_SELECT;
    }
    if (choice.kind === 'add') {
      const added = await this.addServer();
      if (!added) {
        return NavState.SERVER_SELECT;
      }
      selectServer(session, added.server, !added.saved);
      return NavState.ALBUM_SELECT;
    }

    await this.registry.setActive(choice.server.name);
    selectServer(session, choice.server);
    return NavState.ALBUM_SELECT;
  }

  private async albumSelect(session: Session): Promise<NavStateType> {
    const server = session.server;
    if (!server) {
      return NavState.SERVER_SELECT;
    }

    const frame = topFrame(session) ?? pushAlbumFrame(session, '');
    if (frame.kind !== 'albums') {
      return NavState.SONG_SELECT;
    }

    if (frame.failed) {
      const retry = await this.offerRetry(`Could not load albums from ${server.name}`);
      if (!retry) {
        return this.backFromAlbums(session);
      }
      frame.failed = false;
      frame.albums = null;
      return NavState.ALBUM_SELECT;
    }

    if (frame.albums === null) {
      this.notifier.info(frame.searchTerm ? `Searching albums for "${frame.searchTerm}"...` : 'Fetching albums...');
      frame.albums = await this.library.listAlbums(server, frame.searchTerm || undefined);
      if (frame.albums.length === 0) {
        this.notifier.warn(frame.searchTerm ? `No albums match "${frame.searchTerm}".` : 'No albums found.');
      }
    }

    const candidates: Candidate<AlbumChoice>[] = [
      { label: paint(MenuLabel.SEARCH, 'cyan', 'bold'), value: { kind: 'search' } },
    ];
    if (frame.searchTerm) {
      candidates.push({ label: paint(MenuLabel.CLEAR_SEARCH, 'cyan'), value: { kind: 'clearSearch' } });
    }
    for (const album of frame.albums) {
      candidates.push({ label: formatAlbumLabel(album), value: { kind: 'album', album } });
    }

    const header = [
      server.name,
      frame.searchTerm ? `search: ${frame.searchTerm}` : null,
      `${frame.albums.length} albums`,
    ].filter(Boolean).join(' | ');

    const result = await this.picker.choose(candidates, { prompt: MenuPrompt.ALBUM, header });
    if (result.status === 'cancelled') {
      return this.backFromAlbums(session);
    }

    const [choice] = result.values;
    if (!choice) {
      return NavState.ALBUM_SELECT;
    }

    switch (choice.kind) {
      case 'search': {
        const term = await this.prompter.askSearchTerm(frame.searchTerm);
        if (term === null) {
          return NavState.ALBUM_SELECT;
        }
        if (!term.trim()) {
          clearSearch(session);
        } else if (term.trim() !== frame.searchTerm) {
          pushAlbumFrame(session, term);
        }
        return NavState.ALBUM_SELECT;
      }
      case 'clearSearch':
        clearSearch(session);
        return NavState.ALBUM_SELECT;
      case 'album':
        pushSongFrame(session, choice.album);
        return NavState.SONG_SELECT;
    }
  }

  private backFromAlbums(session: Session): NavStateType {
    popFrame(session);
    if (topFrame(session)?.kind === 'albums') {
      return NavState.ALBUM_SELECT;
    }
    clearServer(session);
    return NavState.SERVER_SELECT;
  }

  private async songSelect(session: Session): Promise<NavStateType> {
    const server = session.server;
    if (!server) {
      return NavState.SERVER_SELECT;
    }

    const frame = topFrame(session);
    if (!frame || frame.kind !== 'songs') {
      return NavState.ALBUM_SELECT;
    }

    if (frame.failed) {
      const retry = await this.offerRetry(`Could not load tracks of ${frame.album.title}`);
      if (!retry) {
        popFrame(session);
        return NavState.ALBUM_SELECT;
      }
      frame.failed = false;
      frame.songs = null;
      return NavState.SONG_SELECT;
    }

    if (frame.songs === null || frame.songs.length === 0) {
      this.notifier.info(`Fetching tracks of ${frame.album.title}...`);
      frame.songs = await this.library.listSongs(server, frame.album.id);
    }

    const songs = frame.songs;
    if (songs.length === 0) {
      this.notifier.warn('No songs found in the album.');
      popFrame(session);
      return NavState.ALBUM_SELECT;
    }

    const candidates: Candidate<SongChoice>[] = [];
    if (songs.length > 1) {
      candidates.push({ label: paint(MenuLabel.PLAY_ALL, 'green', 'bold'), value: { kind: 'playAll' } });
    }
    for (const song of songs) {
      candidates.push({ label: formatSongLabel(song), value: { kind: 'song', song } });
    }

    const header = `${frame.album.artist ?? 'Unknown Artist'} - ${frame.album.title} | Tab to select several`;
    const result = await this.picker.choose(candidates, { prompt: MenuPrompt.SONG, multi: true, header });
    if (result.status === 'cancelled') {
      popFrame(session);
      return NavState.ALBUM_SELECT;
    }

    const playAll = result.values.some(choice => choice.kind === 'playAll');
    const chosenIds = new Set(
      result.values.flatMap(choice => (choice.kind === 'song' ? [choice.song.id] : []))
    );
    session.queue = playAll ? [...songs] : songs.filter(song => chosenIds.has(song.id));

    return session.queue.length > 0 ? NavState.PLAYING : NavState.SONG_SELECT;
  }

  private async playing(session: Session): Promise<NavStateType> {
    const server = session.server;
    const frame = topFrame(session);
    if (!server || !frame || frame.kind !== 'songs') {
      session.queue = [];
      return server ? NavState.ALBUM_SELECT : NavState.SERVER_SELECT;
    }

    while (session.queue.length > 0) {
      const [song] = session.queue;
      const descriptor = await this.library.resolveStreamUrl(server, song.id);

      this.notifier.info(formatNowPlaying(song, frame.album));
      const { result, command } = await this.playWithControls(descriptor, song, session.queue.length - 1);
      session.queue.shift();

      switch (command) {
        case 'quit':
          session.queue = [];
          this.notifier.info('Goodbye!');
          return NavState.EXIT;
        case 'album':
          session.queue = [];
          popFrame(session);
          return NavState.ALBUM_SELECT;
        case 'menu':
          session.queue = [];
          clearServer(session);
          return NavState.SERVER_SELECT;
      }

      if (result.outcome === 'failed') {
        throw result.error ?? new PlaybackFailedError('Player failed', { songId: song.id });
      }
      // Ctrl-C 또는 외부에서 플레이어 종료
      if (result.outcome === 'interrupted') {
        session.queue = [];
        this.notifier.warn('Playback stopped.');
        break;
      }
    }

    return NavState.SONG_SELECT;
  }

  /**
   * 곡을 재생하면서 제어 메뉴를 띄운다. 플레이어가 끝나면 메뉴도 닫힌다.
   * 메뉴 취소(Esc)는 재생을 계속하고 메뉴를 다시 띄운다.
   */
  private async playWithControls(
    descriptor: StreamDescriptor,
    song: Song,
    remaining: number
  ): Promise<ControlledPlayback> {
    const ended = new AbortController();
    const settled = this.player.play(descriptor, song)
      .then(
        (result: PlaybackResult) => ({ ok: true as const, result }),
        (error: unknown) => ({ ok: false as const, error })
      )
      .finally(() => ended.abort());

    let command: PlaybackCommand | null = null;
    let paused = false;
    let stopping = false;
    try {
      while (!ended.signal.aborted && !stopping) {
        const choice = await this.chooseControl(song, remaining, paused, ended.signal);
        if (choice === null) {
          continue;
        }

        switch (choice) {
          case 'pause':
            if (this.player.pause()) {
              paused = true;
              this.notifier.info('Paused.');
            } else {
              this.notifier.warn('Pause is not available for this player.');
            }
            break;
          case 'resume':
            if (this.player.resume()) {
              paused = false;
              this.notifier.info('Resumed.');
            }
            break;
          case 'next':
            stopping = true;
            this.player.interrupt('next');
            break;
          default:
            stopping = true;
            command = choice;
            this.player.interrupt('stop');
        }
      }
    } catch (error: unknown) {
      this.player.interrupt('stop');
      await settled;
      throw error;
    }

    const outcome = await settled;
    if (!outcome.ok) {
      throw outcome.error;
    }
    return { result: outcome.result, command };
  }

  private async chooseControl(
    song: Song,
    remaining: number,
    paused: boolean,
    signal: AbortSignal
  ): Promise<PlaybackCommand | null> {
    const candidates: Candidate<PlaybackCommand>[] = [
      paused
        ? { label: paint(MenuLabel.RESUME, 'green', 'bold'), value: 'resume' }
        : { label: paint(MenuLabel.PAUSE, 'yellow', 'bold'), value: 'pause' },
      { label: paint(MenuLabel.NEXT, 'cyan'), value: 'next' },
      { label: paint(MenuLabel.BACK_TO_ALBUMS, 'cyan'), value: 'album' },
      { label: paint(MenuLabel.MAIN_MENU, 'cyan'), value: 'menu' },
      { label: paint(MenuLabel.QUIT, 'red'), value: 'quit' },
    ];
    const header = `${paused ? 'Paused' : 'Playing'}: ${song.title} | ${remaining} more in queue`;

    const result = await this.picker.choose(candidates, { prompt: MenuPrompt.PLAYBACK, header, signal });
    if (result.status === 'cancelled') {
      return null;
    }
    const [choice] = result.values;
    return choice ?? null;
  }

  /**
   * 조회 실패 후 메뉴: Retry만 제공 (취소는 Back)
   */
  private async offerRetry(header: string): Promise<boolean> {
    const result = await this.picker.choose(
      [{ label: paint(MenuLabel.RETRY, 'yellow', 'bold'), value: true }],
      { prompt: MenuPrompt.RETRY, header: `${header} | Esc to go back` }
    );
    return result.status === 'selected';
  }

  /**
   * 에러 → 알림 + 가장 가까운 복구 상태
   */
  private async recover(error: unknown, session: Session, state: NavStateType): Promise<NavStateType> {
    if (error instanceof AuthFailedError) {
      this.notifier.error(error.message);
      if (session.server && await this.reauthenticate(session, session.server)) {
        return state;
      }
      clearServer(session);
      return NavState.SERVER_SELECT;
    }

    if (error instanceof ServerUnreachableError || error instanceof InvalidResponseError) {
      this.notifier.error(error.message);
      if (state === NavState.PLAYING) {
        session.queue = [];
        return NavState.SONG_SELECT;
      }
      const frame = topFrame(session);
      if (frame) {
        frame.failed = true;
      }
      return state;
    }

    if (error instanceof PlaybackFailedError) {
      this.notifier.error(error.message);
      session.queue = [];
      return NavState.SONG_SELECT;
    }

    // 메모리의 서버 목록은 그대로이므로 서버 선택부터 다시
    if (error instanceof RegistryWriteError) {
      this.notifier.error(error.message);
      session.queue = [];
      clearServer(session);
      return NavState.SERVER_SELECT;
    }

    if (error instanceof NotConfiguredError) {
      this.notifier.warn(error.message);
      clearServer(session);
      return NavState.SERVER_SELECT;
    }

    throw error;
  }

  /**
   * 비밀번호를 다시 받아 토큰 갱신 (저장한 서버면 레지스트리에도 반영)
   */
  private async reauthenticate(session: Session, server: Server): Promise<boolean> {
    const password = await this.prompter.askPassword(server);
    if (password === null) {
      return false;
    }

    try {
      const auth = await this.library.authenticate(server.url, server.username, password);
      const updated: Server = { ...server, userId: auth.userId, accessToken: auth.accessToken };
      if (!session.temporary) {
        await this.registry.addOrUpdate(updated);
      }
      session.server = updated;
      this.notifier.success(`Signed in to ${server.name}`);
      logger.info(COMPONENT, 'Token refreshed', { server: server.name });
      return true;
    } catch (error: unknown) {
      if (isAppError(error) && error.isOperational) {
        this.notifier.error(`Sign-in failed: ${error.message}`);
        return false;
      }
      throw error;
    }
  }
}
