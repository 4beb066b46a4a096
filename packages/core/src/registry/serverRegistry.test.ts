import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import os from 'os';
import path from 'path';
import fs from 'fs-extra';
import {
  CorruptStateError,
  NotConfiguredError,
  RegistryWriteError,
  ValidationError,
  type Server,
} from '@jellyfzf/shared';
import { ServerRegistry } from './serverRegistry.js';
import { FileRegistryStorage, MemoryRegistryStorage } from './storage.js';

function makeServer(name: string, overrides: Partial<Server> = {}): Server {
  return {
    name,
    url: `http://${name}.lan:8096`,
    username: 'listener',
    userId: `user-${name}`,
    accessToken: 'test-token',
    ...overrides,
  };
}

class ReadOnlyStorage extends MemoryRegistryStorage {
  failing = false;

  async write(contents: string): Promise<void> {
    if (this.failing) {
      throw Object.assign(new Error('EACCES: permission denied'), { code: 'EACCES' });
    }
    await super.write(contents);
  }
}

describe('ServerRegistry', () => {
  describe('with memory storage', () => {
    let storage: MemoryRegistryStorage;
    let registry: ServerRegistry;

    beforeEach(async () => {
      storage = new MemoryRegistryStorage();
      registry = await new ServerRegistry(storage).load();
    });

    it('should start empty when nothing is stored', () => {
      expect(registry.list()).toEqual([]);
    });

    it('should fail with NotConfigured when empty', () => {
      expect(() => registry.getActive()).toThrow(NotConfiguredError);
      expect(registry.getActiveName()).toBeNull();
    });

    it('should add servers in order and persist each change', async () => {
      await registry.addOrUpdate(makeServer('home'));
      await registry.addOrUpdate(makeServer('office'));
      expect(registry.list().map(s => s.name)).toEqual(['home', 'office']);
      expect(storage.writes).toBe(2);
    });

    it('should update an existing entry in place', async () => {
      await registry.addOrUpdate(makeServer('home'));
      await registry.addOrUpdate(makeServer('office'));
      await registry.addOrUpdate(makeServer('home', { accessToken: 'test-token-2' }));
      expect(registry.list().map(s => s.name)).toEqual(['home', 'office']);
      expect(registry.get('home')?.accessToken).toBe('test-token-2');
    });

    it('should normalize the URL on save', async () => {
      await registry.addOrUpdate(makeServer('home', { url: 'media.lan:8096/' }));
      expect(registry.get('home')?.url).toBe('http://media.lan:8096');
    });

    it('should reject invalid entries', async () => {
      await expect(registry.addOrUpdate(makeServer(' '))).rejects.toBeInstanceOf(ValidationError);
      expect(storage.writes).toBe(0);
    });

    it('should return the first server as active by default', async () => {
      await registry.addOrUpdate(makeServer('home'));
      await registry.addOrUpdate(makeServer('office'));
      expect(registry.getActive().name).toBe('home');
    });

    it('should honour the active pointer', async () => {
      await registry.addOrUpdate(makeServer('home'));
      await registry.addOrUpdate(makeServer('office'));
      await registry.setActive('office');
      expect(registry.getActive().name).toBe('office');
    });

    it('should reject activating an unknown server', async () => {
      await expect(registry.setActive('nowhere')).rejects.toBeInstanceOf(NotConfiguredError);
    });

    it('should fall back to the first server after removing the active one', async () => {
      await registry.addOrUpdate(makeServer('home'));
      await registry.addOrUpdate(makeServer('office'));
      await registry.setActive('office');
      expect(await registry.remove('office')).toBe(true);
      expect(registry.getActive().name).toBe('home');
    });

    it('should report false when removing an unknown server', async () => {
      expect(await registry.remove('nowhere')).toBe(false);
      expect(storage.writes).toBe(0);
    });

    it('should always return an active server that is listed', async () => {
      const names = ['a', 'b', 'c', 'd'];
      for (const name of names) {
        await registry.addOrUpdate(makeServer(name));
      }
      for (const name of names) {
        await registry.setActive(name);
        const active = registry.getActive();
        expect(registry.list()).toContainEqual(active);
      }
      await registry.remove('d');
      expect(registry.list()).toContainEqual(registry.getActive());
    });

    it('should hand out copies', async () => {
      await registry.addOrUpdate(makeServer('home'));
      const copy = registry.getActive();
      copy.accessToken = 'mutated';
      expect(registry.getActive().accessToken).toBe('test-token');
    });
  });

  describe('failed writes', () => {
    let storage: ReadOnlyStorage;
    let registry: ServerRegistry;

    beforeEach(async () => {
      storage = new ReadOnlyStorage();
      registry = await new ServerRegistry(storage).load();
      await registry.addOrUpdate(makeServer('home'));
      await registry.addOrUpdate(makeServer('office'));
      storage.failing = true;
    });

    it('should keep the list unchanged when adding fails', async () => {
      await expect(registry.addOrUpdate(makeServer('studio'))).rejects.toThrow(RegistryWriteError);
      expect(registry.list().map(s => s.name)).toEqual(['home', 'office']);
    });

    it('should keep the old entry when updating fails', async () => {
      await expect(registry.addOrUpdate(makeServer('home', { accessToken: 'test-token-2' }))).rejects.toThrow(
        'Cannot save server list: EACCES: permission denied'
      );
      expect(registry.get('home')?.accessToken).toBe('test-token');
    });

    it('should keep the active server when activating fails', async () => {
      await expect(registry.setActive('office')).rejects.toThrow(RegistryWriteError);
      expect(registry.getActiveName()).toBe('home');
    });

    it('should keep the server when removing fails', async () => {
      await expect(registry.remove('home')).rejects.toThrow(RegistryWriteError);
      expect(registry.list().map(s => s.name)).toEqual(['home', 'office']);
    });

    it('should report the storage location and mark the error operational', async () => {
      const error = await registry.setActive('office').then(() => null, (e: unknown) => e);
      expect(error).toBeInstanceOf(RegistryWriteError);
      if (error instanceof RegistryWriteError) {
        expect(error.isOperational).toBe(true);
        expect(error.path).toBe(':memory:');
      }
    });
  });

  describe('corrupt records', () => {
    it('should fail with CorruptState on invalid JSON', async () => {
      const registry = new ServerRegistry(new MemoryRegistryStorage('{ not json'));
      await expect(registry.load()).rejects.toBeInstanceOf(CorruptStateError);
    });

    it('should fail with CorruptState on schema mismatch', async () => {
      const record = JSON.stringify({ version: 1, active: null, servers: [{ name: 'home' }] });
      const registry = new ServerRegistry(new MemoryRegistryStorage(record));
      await expect(registry.load()).rejects.toThrow(/malformed/);
    });

    it('should fail with CorruptState on duplicate names', async () => {
      const record = JSON.stringify({ version: 1, active: null, servers: [makeServer('home'), makeServer('home')] });
      const registry = new ServerRegistry(new MemoryRegistryStorage(record));
      await expect(registry.load()).rejects.toThrow(/Duplicate server name: home/);
    });

    it('should start empty after reset', async () => {
      const storage = new MemoryRegistryStorage('{ not json');
      const registry = new ServerRegistry(storage);
      expect(await registry.reset()).toBe(':memory:.corrupt');
      expect(registry.list()).toEqual([]);
      expect(await storage.read()).toBeNull();
    });
  });

  describe('with file storage', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await fs.mkdtemp(path.join(os.tmpdir(), 'jellyfzf-registry-'));
    });

    afterEach(async () => {
      await fs.remove(dir);
    });

    it('should round-trip servers losslessly', async () => {
      const file = path.join(dir, 'nested', 'servers.json');
      const first = await new ServerRegistry(new FileRegistryStorage(file)).load();
      const home = makeServer('home');
      const office = makeServer('office', { url: 'https://office.example.org/jellyfin' });
      await first.addOrUpdate(home);
      await first.addOrUpdate(office);
      await first.setActive('office');

      const second = await new ServerRegistry(new FileRegistryStorage(file)).load();
      expect(second.list()).toEqual([home, office]);
      expect(second.getActive()).toEqual(office);
    });

    it('should write the record owner-readable only', async () => {
      const file = path.join(dir, 'servers.json');
      const registry = await new ServerRegistry(new FileRegistryStorage(file)).load();
      await registry.addOrUpdate(makeServer('home'));
      const stat = await fs.stat(file);
      if (process.platform !== 'win32') {
        expect(stat.mode & 0o777).toBe(0o600);
      }
      expect((await fs.readdir(dir)).filter(name => name.endsWith('.tmp'))).toEqual([]);
    });

    it('should move a corrupt file aside on reset', async () => {
      const file = path.join(dir, 'servers.json');
      await fs.writeFile(file, 'garbage');
      const registry = new ServerRegistry(new FileRegistryStorage(file));
      await expect(registry.load()).rejects.toBeInstanceOf(CorruptStateError);

      const movedTo = await registry.reset();
      expect(movedTo).not.toBeNull();
      expect(await fs.pathExists(file)).toBe(false);
      expect(await fs.readFile(String(movedTo), 'utf8')).toBe('garbage');
    });
  });
});
