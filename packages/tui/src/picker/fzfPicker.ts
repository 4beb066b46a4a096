import { PickerError, isNodeErrorWithCode } from '@jellyfzf/shared';
import { logger } from '@jellyfzf/core';
import type { Candidate, ChooseOptions, PickResult, Picker } from './types.js';
import { defaultSpawn, type SpawnFn } from '../utils/process.js';
import { singleLine } from '../tui/utils/formatters.js';

const COMPONENT = 'Picker';

/** fzf 종료 코드: 1 = 일치 항목 없음, 130 = Esc/Ctrl-C */
const CANCEL_EXIT_CODES: readonly number[] = [1, 130];

export interface FzfPickerOptions {
  bin?: string;
  spawn?: SpawnFn;
}

/**
 * fzf 서브프로세스 기반 선택 메뉴
 *
 * 각 줄을 "index<TAB>label"로 보내고 --with-nth로 라벨만 표시한 뒤,
 * 선택된 줄의 index로 후보를 되찾는다.
 */
export class FzfPicker implements Picker {
  private readonly bin: string;
  private readonly spawnFn: SpawnFn;

  constructor(options: FzfPickerOptions = {}) {
    this.bin = options.bin ?? 'fzf';
    this.spawnFn = options.spawn ?? defaultSpawn;
  }

  buildArgs(options: ChooseOptions): string[] {
    const args = [
      '--ansi',
      '--height=40%',
      '--border',
      '--layout=reverse',
      '--delimiter=\t',
      '--with-nth=2..',
      '--prompt',
      `${options.prompt} > `,
    ];
    if (options.multi) {
      args.push('--multi');
    }
    if (options.header) {
      args.push('--header', singleLine(options.header));
    }
    return args;
  }

  choose<T>(candidates: readonly Candidate<T>[], options: ChooseOptions): Promise<PickResult<T>> {
    const args = this.buildArgs(options);
    const input = candidates.map((candidate, index) => `${index}\t${singleLine(candidate.label)}`).join('\n');

    const { signal } = options;
    if (signal?.aborted) {
      return Promise.resolve({ status: 'cancelled' });
    }

    return new Promise<PickResult<T>>((resolve, reject) => {
      const child = this.spawnFn(this.bin, args, { stdio: ['pipe', 'pipe', 'inherit'] });
      let output = '';
      let aborted = false;

      const onAbort = () => {
        aborted = true;
        child.kill('SIGTERM');
      };
      signal?.addEventListener('abort', onAbort, { once: true });

      child.stdout?.setEncoding('utf8');
      child.stdout?.on('data', (chunk: string) => {
        output += chunk;
      });

      child.once('error', (error: Error) => {
        signal?.removeEventListener('abort', onAbort);
        const message = isNodeErrorWithCode(error, 'ENOENT')
          ? `"${this.bin}" was not found; install fzf or use --picker embedded`
          : `Failed to start ${this.bin}: ${error.message}`;
        reject(new PickerError(message, { cause: error, command: this.bin }));
      });

      child.once('close', (code: number | null) => {
        signal?.removeEventListener('abort', onAbort);
        if (aborted) {
          resolve({ status: 'cancelled' });
          return;
        }
        if (code === 0) {
          resolve(this.parseSelection(output, candidates));
          return;
        }
        if (code !== null && CANCEL_EXIT_CODES.includes(code)) {
          resolve({ status: 'cancelled' });
          return;
        }
        reject(new PickerError(`${this.bin} exited with code ${code ?? 'null'}`, { command: this.bin }));
      });

      // fzf may exit before reading everything (e.g. immediate Esc)
      child.stdin?.on('error', (error: Error) => {
        logger.debug(COMPONENT, 'fzf stdin closed early', { error: error.message });
      });
      child.stdin?.end(input.length > 0 ? `${input}\n` : '');
    });
  }

  private parseSelection<T>(output: string, candidates: readonly Candidate<T>[]): PickResult<T> {
    const values: T[] = [];
    for (const line of output.split('\n')) {
      const [indexField] = line.split('\t', 1);
      if (!indexField || !/^\d+$/.test(indexField)) {
        continue;
      }
      const candidate = candidates[Number(indexField)];
      if (candidate) {
        values.push(candidate.value);
      }
    }
    return values.length > 0 ? { status: 'selected', values } : { status: 'cancelled' };
  }
}
