import path from 'path';
import crypto from 'crypto';
import fs from 'fs-extra';
import { REGISTRY_FILE_MODE, isFileNotFoundError } from '@jellyfzf/shared';

/**
 * 서버 목록 레코드 저장소
 */
export interface RegistryStorage {
  readonly location: string;
  /** 레코드 원문, 없으면 null */
  read(): Promise<string | null>;
  write(contents: string): Promise<void>;
  /** 현재 레코드를 옆으로 옮기고 새 위치를 반환 */
  quarantine(): Promise<string | null>;
}

/**
 * 파일 기반 저장소 (임시 파일 + rename 으로 원자적 쓰기)
 */
export class FileRegistryStorage implements RegistryStorage {
  constructor(readonly location: string) {}

  async read(): Promise<string | null> {
    try {
      return await fs.readFile(this.location, 'utf8');
    } catch (error: unknown) {
      if (isFileNotFoundError(error)) {
        return null;
      }
      throw error;
    }
  }

  async write(contents: string): Promise<void> {
    const dir = path.dirname(this.location);
    await fs.ensureDir(dir);

    const tempFile = path.join(dir, `.${path.basename(this.location)}.${crypto.randomBytes(6).toString('hex')}.tmp`);
    try {
      await fs.writeFile(tempFile, contents, { encoding: 'utf8', mode: REGISTRY_FILE_MODE });
      await fs.rename(tempFile, this.location);
    } catch (error: unknown) {
      await fs.remove(tempFile);
      throw error;
    }
  }

  async quarantine(): Promise<string | null> {
    if (!await fs.pathExists(this.location)) {
      return null;
    }
    const target = `${this.location}.corrupt-${Date.now()}`;
    await fs.move(this.location, target, { overwrite: true });
    return target;
  }
}

/**
 * 메모리 저장소 (테스트, 임시 세션용)
 */
export class MemoryRegistryStorage implements RegistryStorage {
  readonly location = ':memory:';
  writes = 0;

  constructor(private contents: string | null = null) {}

  async read(): Promise<string | null> {
    return this.contents;
  }

  async write(contents: string): Promise<void> {
    this.contents = contents;
    this.writes++;
  }

  async quarantine(): Promise<string | null> {
    if (this.contents === null) {
      return null;
    }
    this.contents = null;
    return `${this.location}.corrupt`;
  }
}
