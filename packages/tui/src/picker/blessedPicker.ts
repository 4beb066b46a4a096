import blessed from 'blessed';
import type { Candidate, ChooseOptions, PickResult, Picker } from './types.js';
import { createScreen, type ScreenFactory } from '../tui/screen.js';
import { escapeBlessedMarkup } from '../tui/utils/formatters.js';
import { stripAnsi } from '../utils/ansi.js';

/**
 * 부분 수열 일치 (대소문자 무시, 공백은 구분자)
 * "abrd" 는 "Abbey Road" 와 일치한다.
 */
export function fuzzyMatch(query: string, text: string): boolean {
  const needle = query.toLowerCase().replace(/\s+/g, '');
  if (!needle) return true;

  const haystack = text.toLowerCase();
  let position = 0;
  for (const ch of needle) {
    position = haystack.indexOf(ch, position);
    if (position < 0) return false;
    position += 1;
  }
  return true;
}

/**
 * 검색어와 일치하는 후보 인덱스 (원래 순서 유지)
 */
export function filterCandidates<T>(candidates: readonly Candidate<T>[], query: string): number[] {
  const indices: number[] = [];
  candidates.forEach((candidate, index) => {
    if (fuzzyMatch(query, stripAnsi(candidate.label))) {
      indices.push(index);
    }
  });
  return indices;
}

// eslint-disable-next-line no-control-regex
const PRINTABLE = /^[^\x00-\x1f\x7f]$/u;

/**
 * fzf가 없는 환경을 위한 내장 선택 메뉴 (단일 선택)
 */
export class BlessedPicker implements Picker {
  constructor(private readonly screenFactory: ScreenFactory = createScreen) {}

  choose<T>(candidates: readonly Candidate<T>[], options: ChooseOptions): Promise<PickResult<T>> {
    if (options.signal?.aborted) {
      return Promise.resolve({ status: 'cancelled' });
    }

    return new Promise<PickResult<T>>((resolve) => {
      const screen = this.screenFactory();

      blessed.box({
        parent: screen,
        top: 0,
        left: 0,
        width: '100%',
        height: 1,
        tags: true,
        content: options.header ? `{bold}${escapeBlessedMarkup(options.header)}{/bold}` : '',
      });

      const input = blessed.box({
        parent: screen,
        top: 1,
        left: 0,
        width: '100%',
        height: 1,
        tags: true,
      });

      const list = blessed.list({
        parent: screen,
        top: 2,
        left: 0,
        width: '100%',
        bottom: 1,
        tags: false,
        border: { type: 'line' },
        style: {
          border: { fg: 'cyan' },
          selected: { bg: 'blue', fg: 'white', bold: true },
        },
      });

      blessed.box({
        parent: screen,
        bottom: 0,
        left: 0,
        width: '100%',
        height: 1,
        tags: true,
        content: '{gray-fg}[Type] Filter  [Up/Down] Move  [Enter] Select  [Esc] Back{/gray-fg}',
      });

      let query = '';
      let visible: number[] = [];
      let cursor = 0;
      let finished = false;

      const refresh = () => {
        visible = filterCandidates(candidates, query);
        cursor = Math.min(cursor, Math.max(visible.length - 1, 0));
        list.setItems(visible.map(index => candidates[index].label));
        list.select(cursor);
        input.setContent(
          `{cyan-fg}{bold}${escapeBlessedMarkup(options.prompt)} >{/bold}{/cyan-fg} ${escapeBlessedMarkup(query)}` +
          ` {gray-fg}${visible.length}/${candidates.length}{/gray-fg}`
        );
        screen.render();
      };

      const onAbort = () => finish({ status: 'cancelled' });

      const finish = (result: PickResult<T>) => {
        if (finished) return;
        finished = true;
        options.signal?.removeEventListener('abort', onAbort);
        screen.destroy();
        resolve(result);
      };

      options.signal?.addEventListener('abort', onAbort, { once: true });

      screen.on('keypress', (ch: string | undefined, key: blessed.Widgets.Events.IKeyEventArg) => {
        if (finished) return;

        if (key.name === 'escape' || (key.ctrl && key.name === 'c')) {
          finish({ status: 'cancelled' });
          return;
        }

        switch (key.name) {
          case 'enter':
          case 'return': {
            const index = visible[cursor];
            finish(index === undefined ? { status: 'cancelled' } : { status: 'selected', values: [candidates[index].value] });
            return;
          }
          case 'up':
            cursor = Math.max(cursor - 1, 0);
            list.select(cursor);
            screen.render();
            return;
          case 'down':
            cursor = Math.min(cursor + 1, Math.max(visible.length - 1, 0));
            list.select(cursor);
            screen.render();
            return;
          case 'backspace':
            query = query.slice(0, -1);
            cursor = 0;
            refresh();
            return;
          default:
            if (ch && !key.ctrl && !key.meta && PRINTABLE.test(ch)) {
              query += ch;
              cursor = 0;
              refresh();
            }
        }
      });

      refresh();
    });
  }
}
