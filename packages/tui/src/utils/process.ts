/**
 * 외부 프로세스(fzf, 플레이어) 실행 추상화
 *
 * 테스트에서는 가짜 프로세스를 주입한다.
 */

import { spawn, type SpawnOptions } from 'child_process';
import type { Readable, Writable } from 'stream';

export interface SpawnedProcess {
  readonly stdin: Writable | null;
  readonly stdout: Readable | null;
  kill(signal?: NodeJS.Signals | number): boolean;
  once(event: 'close', listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
  once(event: 'error', listener: (error: Error) => void): unknown;
}

export type SpawnFn = (command: string, args: readonly string[], options: SpawnOptions) => SpawnedProcess;

export const defaultSpawn: SpawnFn = (command, args, options) => spawn(command, args, options);

/**
 * "mpv --no-video" 형식의 명령 문자열을 실행 파일과 인자로 분리
 */
export function splitCommand(commandLine: string): { command: string; args: string[] } {
  const [command = '', ...args] = commandLine.trim().split(/\s+/).filter(Boolean);
  return { command, args };
}
