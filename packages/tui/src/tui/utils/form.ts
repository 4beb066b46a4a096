import blessed from 'blessed';
import { escapeBlessedMarkup } from './formatters.js';

export interface FormField<K extends string> {
  key: K;
  label: string;
  censor?: boolean;
  initial?: string;
}

interface FormOptions<K extends string> {
  screen: blessed.Widgets.Screen;
  title: string;
  subtitle?: string;
  fields: FormField<K>[];
  /** 오류 메시지를 돌려주면 제출을 막고 해당 필드로 돌아간다 */
  validate?: (values: Map<K, string>) => { message: string; field: K } | null;
}

const LABEL_WIDTH = 12;
const INPUT_WIDTH = 34;

/**
 * 입력 필드 대화 상자
 *
 * [Tab] 다음 필드, [Enter] 다음 필드 또는 제출, [Esc] 취소 (null)
 */
export function showForm<K extends string>(options: FormOptions<K>): Promise<Map<K, string> | null> {
  const { screen, title, subtitle = '', fields, validate } = options;

  return new Promise((resolve) => {
    const firstFieldRow = subtitle ? 4 : 3;

    const dialogBox = blessed.box({
      parent: screen,
      top: 'center',
      left: 'center',
      width: LABEL_WIDTH + INPUT_WIDTH + 8,
      height: fields.length + firstFieldRow + 5,
      tags: true,
      border: { type: 'line' },
      style: {
        border: { fg: 'cyan' },
        bg: 'black'
      }
    });

    const safeTitle = escapeBlessedMarkup(title);
    const subtitleLine = subtitle ? `\n  {cyan-fg}${escapeBlessedMarkup(subtitle)}{/cyan-fg}` : '';

    const render = (errorMessage = '') => {
      const labels = fields.map(field => `  ${field.label.padEnd(LABEL_WIDTH - 2)}`).join('\n');
      const errorLine = errorMessage ? `{red-fg}Error: ${escapeBlessedMarkup(errorMessage)}{/red-fg}` : '';
      dialogBox.setContent(
        `\n  {bold}${safeTitle}{/bold}${subtitleLine}\n\n${labels}\n\n  ${errorLine}\n  {gray-fg}[Tab] Switch  [Enter] Next/Submit  [Esc] Cancel{/gray-fg}`
      );
      screen.render();
    };

    const inputs = fields.map((field, index) => {
      const input = blessed.textbox({
        parent: dialogBox,
        top: firstFieldRow + index,
        left: LABEL_WIDTH,
        width: INPUT_WIDTH,
        height: 1,
        censor: field.censor ?? false,
        style: {
          fg: 'white',
          bg: 'blue',
          focus: { fg: 'yellow', bg: 'blue' }
        }
      });
      input.setValue(field.initial ?? '');
      return input;
    });

    let current = 0;
    let switchTo: number | null = null;
    let done = false;

    const readValues = (): Map<K, string> => {
      const values = new Map<K, string>();
      fields.forEach((field, index) => {
        // Tab은 필드 전환 키라서 값에 섞여 들어올 수 있다
        const raw = inputs[index].getValue().replace(/\t/g, '');
        values.set(field.key, field.censor ? raw : raw.trim());
      });
      return values;
    };

    const finish = (result: Map<K, string> | null) => {
      if (done) return;
      done = true;
      for (const input of inputs) {
        input.removeAllListeners();
      }
      dialogBox.destroy();
      screen.render();
      resolve(result);
    };

    const focus = (index: number) => {
      current = index;
      inputs[index].readInput();
    };

    const submit = () => {
      const values = readValues();
      const problem = validate ? validate(values) : null;
      if (problem) {
        render(problem.message);
        focus(Math.max(fields.findIndex(field => field.key === problem.field), 0));
        return;
      }
      finish(values);
    };

    inputs.forEach((input, index) => {
      input.on('submit', () => {
        if (index === inputs.length - 1) {
          submit();
        } else {
          focus(index + 1);
        }
      });

      input.on('cancel', () => {
        if (switchTo !== null) {
          const target = switchTo;
          switchTo = null;
          setImmediate(() => focus(target));
        } else {
          finish(null);
        }
      });

      input.on('keypress', (_ch: string | undefined, key: blessed.Widgets.Events.IKeyEventArg | undefined) => {
        if (key && key.name === 'tab') {
          switchTo = (current + (key.shift ? inputs.length - 1 : 1)) % inputs.length;
          input.cancel();
        }
      });
    });

    render();
    focus(0);
  });
}
