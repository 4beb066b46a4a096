import blessed from 'blessed';

export type ScreenFactory = () => blessed.Widgets.Screen;

/**
 * 대화 상자 하나를 위한 전체 화면 (닫을 때 destroy로 터미널 복구)
 */
export const createScreen: ScreenFactory = () =>
  blessed.screen({
    smartCSR: true,
    fullUnicode: true,
    title: 'jellyfzf',
  });
