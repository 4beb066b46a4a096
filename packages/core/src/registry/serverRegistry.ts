import {
  CorruptStateError,
  NotConfiguredError,
  RegistryWriteError,
  REGISTRY_VERSION,
  ValidationError,
  getErrorMessage,
  normalizeServerUrl,
  type RegistryRecord,
  type Server,
} from '@jellyfzf/shared';
import { logger } from '../utils/index.js';
import { registryRecordSchema, serverSchema } from './schema.js';
import type { RegistryStorage } from './storage.js';

const COMPONENT = 'Registry';

/**
 * 등록된 Jellyfin 서버 목록과 활성 서버 관리
 *
 * 모든 변경은 즉시 저장소에 기록되며, 기록에 실패하면 메모리 상태도 바뀌지 않는다.
 */
export class ServerRegistry {
  private servers: Server[] = [];
  private active: string | null = null;
  private loaded = false;

  constructor(private readonly storage: RegistryStorage) {}

  get location(): string {
    return this.storage.location;
  }

  /**
   * 저장소에서 레코드 로드
   * 파일이 없으면 빈 목록, 파싱/스키마 실패는 CorruptStateError
   */
  async load(): Promise<this> {
    let raw: string | null;
    try {
      raw = await this.storage.read();
    } catch (error: unknown) {
      throw new CorruptStateError(`Cannot read server registry: ${getErrorMessage(error)}`, {
        cause: error instanceof Error ? error : undefined,
        path: this.storage.location,
      });
    }

    if (raw === null) {
      this.servers = [];
      this.active = null;
      this.loaded = true;
      logger.debug(COMPONENT, 'No registry record yet', { path: this.storage.location });
      return this;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error: unknown) {
      throw new CorruptStateError('Server registry is not valid JSON', {
        cause: error instanceof Error ? error : undefined,
        path: this.storage.location,
      });
    }

    const result = registryRecordSchema.safeParse(json);
    if (!result.success) {
      const issue = result.error.issues[0];
      throw new CorruptStateError(
        `Server registry is malformed: ${issue ? `${issue.path.join('.')}: ${issue.message}` : 'unknown issue'}`,
        { path: this.storage.location }
      );
    }

    this.servers = result.data.servers;
    this.active = result.data.active;
    this.loaded = true;
    logger.debug(COMPONENT, 'Registry loaded', { path: this.storage.location, servers: this.servers.length });
    return this;
  }

  /**
   * 손상된 레코드를 옆으로 옮기고 빈 목록으로 시작
   */
  async reset(): Promise<string | null> {
    const movedTo = await this.storage.quarantine();
    this.servers = [];
    this.active = null;
    this.loaded = true;
    if (movedTo) {
      logger.warn(COMPONENT, 'Registry moved aside', { movedTo });
    }
    return movedTo;
  }

  list(): Server[] {
    this.assertLoaded();
    return this.servers.map(server => ({ ...server }));
  }

  get(name: string): Server | undefined {
    this.assertLoaded();
    const server = this.servers.find(entry => entry.name === name);
    return server ? { ...server } : undefined;
  }

  get size(): number {
    return this.servers.length;
  }

  /**
   * 같은 이름이 있으면 제자리 교체, 없으면 끝에 추가
   */
  async addOrUpdate(server: Server): Promise<void> {
    this.assertLoaded();
    const candidate = { ...server, url: normalizeServerUrl(server.url) };
    const result = serverSchema.safeParse(candidate);
    if (!result.success) {
      const issue = result.error.issues[0];
      throw new ValidationError(
        issue ? `${issue.path.join('.')}: ${issue.message}` : 'Invalid server entry',
        { field: issue ? issue.path.join('.') : undefined }
      );
    }

    const entry = result.data;
    const index = this.servers.findIndex(existing => existing.name === entry.name);
    const servers = index >= 0
      ? this.servers.map((existing, i) => (i === index ? entry : existing))
      : [...this.servers, entry];
    await this.commit(servers, this.active);
    logger.info(COMPONENT, index >= 0 ? 'Server updated' : 'Server added', { name: entry.name, url: entry.url });
  }

  async remove(name: string): Promise<boolean> {
    this.assertLoaded();
    const index = this.servers.findIndex(existing => existing.name === name);
    if (index < 0) {
      return false;
    }
    const servers = this.servers.filter((_, i) => i !== index);
    await this.commit(servers, this.active === name ? null : this.active);
    logger.info(COMPONENT, 'Server removed', { name });
    return true;
  }

  async setActive(name: string): Promise<void> {
    this.assertLoaded();
    if (!this.servers.some(server => server.name === name)) {
      throw new NotConfiguredError(`Server "${name}" is not registered`, { context: { name } });
    }
    if (this.active === name) {
      return;
    }
    await this.commit(this.servers, name);
  }

  /**
   * 활성 서버 반환 (활성 지정이 없거나 사라졌으면 첫 번째 서버)
   */
  getActive(): Server {
    this.assertLoaded();
    const server = this.servers.find(entry => entry.name === this.active) ?? this.servers[0];
    if (!server) {
      throw new NotConfiguredError();
    }
    return { ...server };
  }

  getActiveName(): string | null {
    return this.servers.length > 0 ? this.getActive().name : null;
  }

  private assertLoaded(): void {
    if (!this.loaded) {
      throw new Error('ServerRegistry.load() must be called before use');
    }
  }

  /**
   * 새 상태를 먼저 기록하고, 성공했을 때만 메모리에 반영
   */
  private async commit(servers: Server[], active: string | null): Promise<void> {
    const record: RegistryRecord = {
      version: REGISTRY_VERSION,
      active,
      servers,
    };
    try {
      await this.storage.write(`${JSON.stringify(record, null, 2)}\n`);
    } catch (error: unknown) {
      throw new RegistryWriteError(`Cannot save server list: ${getErrorMessage(error)}`, {
        cause: error instanceof Error ? error : undefined,
        path: this.storage.location,
      });
    }
    this.servers = servers;
    this.active = active;
  }
}
