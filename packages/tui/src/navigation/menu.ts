// Fixed menu entries shown above library items

export const MenuLabel = {
  ADD_SERVER: '+ Add server',
  SEARCH: '/ Search albums...',
  CLEAR_SEARCH: 'x Clear search',
  RETRY: '~ Retry',
  PLAY_ALL: '> Play all',
  PAUSE: '|| Pause',
  RESUME: '> Resume',
  NEXT: '>> Next',
  BACK_TO_ALBUMS: '< Back to albums',
  MAIN_MENU: '^ Main menu',
  QUIT: 'q Quit',
} as const;

export const MenuPrompt = {
  SERVER: 'Select server',
  ALBUM: 'Select Album',
  SONG: 'Select Tracks',
  RETRY: 'Retry',
  PLAYBACK: 'Playback',
} as const;

/** 재생 중 메뉴에서 고른 명령 */
export type PlaybackCommand = 'pause' | 'resume' | 'next' | 'album' | 'menu' | 'quit';
