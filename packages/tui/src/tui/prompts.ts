/**
 * 서버 추가, 비밀번호, 검색어 입력 대화 상자
 */

import { normalizeServerUrl, sanitizeInput, type Server } from '@jellyfzf/shared';
import { createScreen, type ScreenFactory } from './screen.js';
import { showForm, type FormField } from './utils/form.js';

export interface NewServerInput {
  name: string;
  url: string;
  username: string;
  password: string;
  /** false면 이번 실행에서만 사용하고 저장하지 않음 */
  save: boolean;
}

export interface Prompter {
  /** 취소하면 null */
  askServer(defaults?: Partial<Pick<NewServerInput, 'name' | 'url' | 'username'>>): Promise<NewServerInput | null>;
  askPassword(server: Server): Promise<string | null>;
  /** 빈 문자열은 검색 해제 */
  askSearchTerm(initial: string): Promise<string | null>;
}

const MAX_NAME_LENGTH = 64;
const MAX_SEARCH_LENGTH = 200;

type ServerField = keyof NewServerInput;

/**
 * y/yes → true, 빈 값/n/no → false, 그 밖은 null
 */
export function parseYesNo(value: string): boolean | null {
  const answer = value.trim().toLowerCase();
  if (answer === 'y' || answer === 'yes') return true;
  if (answer === '' || answer === 'n' || answer === 'no') return false;
  return null;
}

/**
 * 새 서버 입력 검증 (실패 시 메시지와 필드)
 */
export function validateServerInput(values: Map<ServerField, string>): { message: string; field: ServerField } | null {
  const name = values.get('name') ?? '';
  if (!name) return { message: 'Name is required', field: 'name' };
  if (name.length > MAX_NAME_LENGTH) return { message: `Name too long (max ${MAX_NAME_LENGTH} chars)`, field: 'name' };

  const url = normalizeServerUrl(values.get('url') ?? '');
  if (!url) return { message: 'Server URL is required', field: 'url' };
  try {
    new URL(url);
  } catch {
    return { message: 'Server URL is not valid', field: 'url' };
  }

  if (!values.get('username')) return { message: 'Username is required', field: 'username' };
  if (!values.get('password')) return { message: 'Password is required', field: 'password' };
  if (parseYesNo(values.get('save') ?? '') === null) return { message: 'Answer y or n', field: 'save' };
  return null;
}

export class BlessedPrompter implements Prompter {
  constructor(private readonly screenFactory: ScreenFactory = createScreen) {}

  async askServer(defaults: Partial<Pick<NewServerInput, 'name' | 'url' | 'username'>> = {}): Promise<NewServerInput | null> {
    const fields: FormField<ServerField>[] = [
      { key: 'name', label: 'Name:', initial: defaults.name },
      { key: 'url', label: 'URL:', initial: defaults.url },
      { key: 'username', label: 'Username:', initial: defaults.username },
      { key: 'password', label: 'Password:', censor: true },
      { key: 'save', label: 'Save? y/n', initial: 'y' },
    ];

    const values = await this.withScreen(screen =>
      showForm({
        screen,
        title: 'Add Jellyfin server',
        subtitle: 'e.g. https://jellyfin.example:8096',
        fields,
        validate: validateServerInput,
      })
    );
    if (!values) return null;

    return {
      name: values.get('name') ?? '',
      url: normalizeServerUrl(values.get('url') ?? ''),
      username: values.get('username') ?? '',
      password: values.get('password') ?? '',
      save: parseYesNo(values.get('save') ?? '') ?? false,
    };
  }

  async askPassword(server: Server): Promise<string | null> {
    const values = await this.withScreen(screen =>
      showForm({
        screen,
        title: `Sign in to ${server.name}`,
        subtitle: `${server.username} @ ${server.url}`,
        fields: [{ key: 'password', label: 'Password:', censor: true }],
        validate: v => (v.get('password') ? null : { message: 'Password is required', field: 'password' }),
      })
    );
    return values ? values.get('password') ?? null : null;
  }

  async askSearchTerm(initial: string): Promise<string | null> {
    const values = await this.withScreen(screen =>
      showForm({
        screen,
        title: 'Search albums',
        subtitle: 'Title, artist or genre (empty to clear)',
        fields: [{ key: 'term', label: 'Search:', initial }],
      })
    );
    return values ? sanitizeInput(values.get('term') ?? '', MAX_SEARCH_LENGTH) : null;
  }

  private async withScreen<T>(body: (screen: ReturnType<ScreenFactory>) => Promise<T>): Promise<T> {
    const screen = this.screenFactory();
    try {
      return await body(screen);
    } finally {
      screen.destroy();
    }
  }
}
