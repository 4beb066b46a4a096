/**
 * 선택 메뉴 인터페이스
 *
 * fzf 서브프로세스, 내장 blessed 목록, 테스트용 가짜 구현이 공유한다.
 */

export interface Candidate<T> {
  /** 표시 문자열 (ANSI 색상 포함 가능) */
  label: string;
  value: T;
}

export interface ChooseOptions {
  prompt: string;
  /** 여러 항목 선택 허용 */
  multi?: boolean;
  header?: string;
  /** abort되면 메뉴를 닫고 cancelled로 끝난다 */
  signal?: AbortSignal;
}

export type PickResult<T> =
  | { status: 'selected'; values: T[] }
  | { status: 'cancelled' };

export interface Picker {
  choose<T>(candidates: readonly Candidate<T>[], options: ChooseOptions): Promise<PickResult<T>>;
}
