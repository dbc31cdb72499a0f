import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ServerRegistry } from './ServerRegistry.js';
import { ServerConfiguration } from './ServerConfiguration.js';
import { ConfigFileLoader } from './ConfigFileLoader.js';
import { JsonPreferenceStore, MemoryPreferenceStore } from './PreferenceStore.js';
import { ConfigurationError, PersistenceError, RegistryError } from '../utils/errors.js';
import type { ErrorSurface } from '../types/index.js';
import { FlakyStore, fakeConnections, seededStore, type FakeConnections } from '../../tests/fakes.js';

describe('ServerRegistry', () => {
  let testDir: string;
  let serverDirectory: string;
  let fakes: FakeConnections;
  let reported: string[];
  let errorSurface: ErrorSurface;

  const named = (name: string) => new ServerConfiguration({ ServerName: name });

  const createRegistry = (store: MemoryPreferenceStore = seededStore([])) =>
    ServerRegistry.create({
      store,
      connectionFactory: fakes.factory,
      errorSurface,
      config: { serverDirectory }
    });

  const writeConfig = (name: string, content: string): string => {
    fs.mkdirSync(serverDirectory, { recursive: true });
    const filePath = path.join(serverDirectory, name);
    fs.writeFileSync(filePath, content);
    return filePath;
  };

  beforeEach(() => {
    testDir = fs.mkdtempSync(path.join(os.tmpdir(), 'server-registry-test-'));
    serverDirectory = path.join(testDir, 'servers');
    fakes = fakeConnections();
    reported = [];
    errorSurface = { report: (message) => reported.push(message) };
    vi.spyOn(console, 'debug').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(testDir, { recursive: true, force: true });
  });

  describe('Adding servers', () => {
    it('should append servers in order', async () => {
      const registry = await createRegistry(seededStore(['alpha']));

      registry.add(named('beta'));
      registry.add(named('gamma'));

      expect(registry.listNames()).toEqual(['alpha', 'beta', 'gamma']);
    });

    it('should resolve name collisions with increasing suffixes', async () => {
      const registry = await createRegistry(seededStore(['alpha']));

      registry.add(named('foo'));
      registry.add(named('foo'));
      registry.add(named('foo'));

      expect(registry.listNames()).toEqual(['alpha', 'foo', 'foo_1', 'foo_2']);
    });

    it('should reuse the lowest free suffix after a removal', async () => {
      const registry = await createRegistry(seededStore(['foo', 'foo_1', 'foo_2']));

      registry.remove('foo_1');
      registry.add(named('foo'));

      expect(registry.listNames()).toEqual(['foo', 'foo_2', 'foo_1']);
    });

    it('should suffix from the original name, not from a suffixed one', async () => {
      const registry = await createRegistry(seededStore(['foo_1']));

      registry.add(named('foo_1'));

      expect(registry.listNames()).toEqual(['foo_1', 'foo_1_1']);
    });

    it('should not modify the caller configuration', async () => {
      const registry = await createRegistry(seededStore(['foo']));
      const config = named('foo');

      const handle = registry.add(config);

      expect(config.name).toBe('foo');
      expect(registry.entry(handle)?.name).toBe('foo_1');
    });

    it('should name servers with an empty name', async () => {
      const registry = await createRegistry(seededStore(['alpha']));

      registry.add(named(''));
      registry.add(named(''));

      expect(registry.listNames()).toEqual(['alpha', 'Server', 'Server_1']);
    });

    it('should persist the full list after every add', async () => {
      const store = seededStore(['alpha']);
      const registry = await createRegistry(store);

      registry.add(new ServerConfiguration({ ServerName: 'beta', Connection: 'SSH', HostAddress: 'b.test' }));

      expect(store.writes).toBe(1);
      expect(store.read()).toEqual([
        { ServerName: 'alpha' },
        { ServerName: 'beta', Connection: 'SSH', HostAddress: 'b.test' }
      ]);
    });
  });

  describe('Finding servers', () => {
    it('should find active servers by exact name', async () => {
      const registry = await createRegistry(seededStore(['alpha', 'beta']));

      const handle = registry.find('beta');

      expect(handle).toBeDefined();
      expect(handle && registry.entry(handle)?.name).toBe('beta');
      expect(registry.find('Beta')).toBeUndefined();
      expect(registry.find('missing')).toBeUndefined();
    });

    it('should return configuration copies', async () => {
      const registry = await createRegistry(seededStore(['alpha']));

      const config = registry.configuration('alpha');
      config?.setValue('HostAddress', 'changed.test');

      expect(registry.configuration('alpha')?.toJSON()).toEqual({ ServerName: 'alpha' });
      expect(registry.configuration('missing')).toBeUndefined();
    });
  });

  describe('Removing servers', () => {
    it('should retire a server removed by name', async () => {
      const store = seededStore(['alpha', 'beta']);
      const registry = await createRegistry(store);

      expect(registry.remove('alpha')).toBe(true);

      expect(registry.listNames()).toEqual(['beta']);
      expect(registry.listRetiredNames()).toEqual(['alpha']);
      expect(store.read()).toEqual([{ ServerName: 'beta' }]);
    });

    it('should retire a server removed by handle', async () => {
      const registry = await createRegistry(seededStore(['alpha']));
      const handle = registry.add(named('beta'));

      expect(registry.remove(handle)).toBe(true);

      expect(registry.listNames()).toEqual(['alpha']);
      expect(registry.isActive(handle)).toBe(false);
    });

    it('should keep handles readable after removal', async () => {
      const registry = await createRegistry(seededStore(['alpha', 'beta']));
      const handle = registry.find('alpha');
      if (!handle) throw new Error('alpha not loaded');

      registry.remove('alpha');

      expect(registry.entry(handle)?.name).toBe('alpha');
      expect(registry.entry(handle)?.isDestroyed).toBe(false);
      expect(fakes.byName('alpha')[0].destroys).toBe(0);
    });

    it('should still persist when nothing matches', async () => {
      const store = seededStore(['alpha']);
      const registry = await createRegistry(store);

      expect(registry.remove('missing')).toBe(false);

      expect(store.writes).toBe(1);
      expect(registry.listNames()).toEqual(['alpha']);
    });

    it('should not retire an entry twice', async () => {
      const registry = await createRegistry(seededStore(['alpha', 'beta']));
      const handle = registry.find('alpha');
      if (!handle) throw new Error('alpha not loaded');

      registry.remove(handle);

      expect(registry.remove(handle)).toBe(false);
      expect(registry.listRetiredNames()).toEqual(['alpha']);
    });
  });

  describe('Reordering servers', () => {
    it('should swap a server with its predecessor', async () => {
      const store = seededStore(['a', 'b', 'c']);
      const registry = await createRegistry(store);

      expect(registry.moveUp('c')).toBe(true);

      expect(registry.listNames()).toEqual(['a', 'c', 'b']);
      expect(store.read()).toEqual([{ ServerName: 'a' }, { ServerName: 'c' }, { ServerName: 'b' }]);
    });

    it('should swap a server with its successor', async () => {
      const registry = await createRegistry(seededStore(['a', 'b', 'c']));

      expect(registry.moveDown('a')).toBe(true);

      expect(registry.listNames()).toEqual(['b', 'a', 'c']);
    });

    it('should not move past the boundaries', async () => {
      const store = seededStore(['a', 'b', 'c']);
      const registry = await createRegistry(store);

      expect(registry.moveUp('a')).toBe(false);
      expect(registry.moveDown('c')).toBe(false);

      expect(registry.listNames()).toEqual(['a', 'b', 'c']);
      expect(store.writes).toBe(2);
    });

    it('should ignore unknown names', async () => {
      const registry = await createRegistry(seededStore(['a', 'b']));

      expect(registry.moveUp('missing')).toBe(false);
      expect(registry.moveDown('missing')).toBe(false);

      expect(registry.listNames()).toEqual(['a', 'b']);
    });
  });

  describe('Connections', () => {
    it('should open the requested servers in order and skip unknown names', async () => {
      const registry = await createRegistry(seededStore(['alpha', 'beta', 'gamma']));

      await registry.connectServers(['gamma', 'missing', 'alpha']);

      expect(fakes.opened).toEqual(['gamma', 'alpha']);
      expect(fakes.byName('beta')[0].opens).toBe(0);
      expect(console.warn).not.toHaveBeenCalled();
    });

    it('should keep connecting after a failed open', async () => {
      fakes = fakeConnections({ open: ['alpha'] });
      const registry = await createRegistry(seededStore(['alpha', 'beta']));

      await registry.connectServers(['alpha', 'beta']);

      expect(fakes.opened).toEqual(['beta']);
      expect(console.warn).toHaveBeenCalledWith('[ServerRegistry] Failed to open alpha: open refused by alpha');
    });

    it('should close every active connection', async () => {
      const registry = await createRegistry(seededStore(['alpha', 'beta']));
      await registry.connectServers(['alpha', 'beta']);

      await registry.closeAllConnections();

      expect(fakes.connections.map(c => c.state)).toEqual(['closed', 'closed']);
    });

    it('should log close failures without throwing', async () => {
      fakes = fakeConnections({ close: ['alpha'] });
      const registry = await createRegistry(seededStore(['alpha', 'beta']));

      await expect(registry.closeAllConnections()).resolves.toBeUndefined();

      expect(fakes.byName('beta')[0].closes).toBe(1);
      expect(console.warn).toHaveBeenCalledWith('[ServerRegistry] Failed to close alpha: close refused by alpha');
    });

    it('should not close retired servers', async () => {
      const registry = await createRegistry(seededStore(['alpha', 'beta']));
      registry.remove('alpha');

      await registry.closeAllConnections();

      expect(fakes.byName('alpha')[0].closes).toBe(0);
      expect(fakes.byName('beta')[0].closes).toBe(1);
    });
  });

  describe('Teardown', () => {
    it('should destroy active and retired entries exactly once', async () => {
      const registry = await createRegistry(seededStore(['alpha', 'beta']));
      registry.add(named('gamma'));
      registry.remove('beta');

      registry.teardown();
      registry.teardown();

      expect(fakes.connections.map(c => [c.name, c.destroys])).toEqual([
        ['alpha', 1],
        ['beta', 1],
        ['gamma', 1]
      ]);
    });

    it('should release every entry', async () => {
      const registry = await createRegistry(seededStore(['alpha']));
      const handle = registry.find('alpha');
      if (!handle) throw new Error('alpha not loaded');

      registry.teardown();

      expect(registry.entry(handle)).toBeUndefined();
      expect(registry.listNames()).toEqual([]);
      expect(registry.listRetiredNames()).toEqual([]);
    });

    it('should leave the saved list alone after teardown', async () => {
      const store = seededStore(['alpha']);
      const registry = await createRegistry(store);

      registry.teardown();
      registry.remove('alpha');

      expect(store.writes).toBe(0);
      expect(store.read()).toEqual([{ ServerName: 'alpha' }]);
    });

    it('should refuse new servers after teardown', async () => {
      const registry = await createRegistry(seededStore(['alpha']));
      registry.teardown();

      expect(() => registry.add(named('beta'))).toThrow(RegistryError);
    });

    it('should refuse to open destroyed entries', async () => {
      const registry = await createRegistry(seededStore(['alpha']));
      const handle = registry.find('alpha');
      const entry = handle ? registry.entry(handle) : undefined;
      if (!entry) throw new Error('alpha not loaded');

      registry.teardown();

      await expect(entry.open()).rejects.toThrow('Cannot open destroyed server entry: alpha');
    });
  });

  describe('Persistence failures', () => {
    it('should keep working and record the failure', async () => {
      const store = new FlakyStore();
      const registry = await createRegistry(store);

      const handle = registry.add(named('alpha'));

      expect(registry.entry(handle)?.name).toBe('alpha');
      expect(registry.lastSaveError).toBeInstanceOf(PersistenceError);
      expect(registry.lastSaveError?.message).toBe('Failed to save server list: disk full');
      expect(console.warn).toHaveBeenCalledWith(
        '[ServerRegistry] [PERSISTENCE_FAILURE] Failed to save server list: disk full'
      );
    });

    it('should clear the failure after a successful save', async () => {
      const store = new FlakyStore();
      const registry = await createRegistry(store);
      registry.add(named('alpha'));

      store.failing = false;
      registry.add(named('beta'));

      expect(registry.lastSaveError).toBeNull();
      expect(store.read()).toEqual([
        { ServerName: 'Local', Connection: 'Local', QueueSystem: 'Basic', HostAddress: 'localhost' },
        { ServerName: 'alpha' },
        { ServerName: 'beta' }
      ]);
    });
  });

  describe('Load pipeline', () => {
    it('should restore the saved list without scanning the directory', async () => {
      writeConfig('a.cfg', 'ServerName: FromFile\n');
      const loader = new ConfigFileLoader();
      const loadFromFile = vi.spyOn(loader, 'loadFromFile');

      const registry = await ServerRegistry.create({
        store: seededStore(['alpha', 'beta']),
        loader,
        connectionFactory: fakes.factory,
        errorSurface,
        config: { serverDirectory }
      });

      expect(registry.listNames()).toEqual(['alpha', 'beta']);
      expect(registry.loadReport).toEqual({ source: 'preferences', count: 2, skippedFiles: [] });
      expect(loadFromFile).not.toHaveBeenCalled();
    });

    it('should not persist a restored list', async () => {
      const store = seededStore(['alpha']);

      await createRegistry(store);

      expect(store.writes).toBe(0);
    });

    it('should restore every saved attribute', async () => {
      const saved = { ServerName: 'cluster', Connection: 'SSH', HostAddress: 'c.test', Port: 2222, JobLimit: 4 };
      const registry = await createRegistry(new MemoryPreferenceStore([saved]));

      expect(registry.configuration('cluster')?.toJSON()).toEqual(saved);
    });

    it('should scan the server directory when nothing is saved', async () => {
      const store = seededStore([]);
      writeConfig('b.cfg', 'ServerName: B\nConnection: HTTPS\n');
      writeConfig('a.cfg', 'ServerName: A\n');
      writeConfig('notes.txt', 'ServerName: Ignored\n');

      const registry = await createRegistry(store);

      expect(registry.listNames()).toEqual(['A', 'B']);
      expect(registry.loadReport).toEqual({ source: 'directory', count: 2, skippedFiles: [] });
      expect(store.read()).toEqual([{ ServerName: 'A' }, { ServerName: 'B', Connection: 'HTTPS' }]);
    });

    it('should de-duplicate names found in the directory', async () => {
      writeConfig('one.cfg', 'ServerName: dup\n');
      writeConfig('two.cfg', 'ServerName: dup\n');

      const registry = await createRegistry();

      expect(registry.listNames()).toEqual(['dup', 'dup_1']);
    });

    it('should skip files that fail to load', async () => {
      writeConfig('a.cfg', 'ServerName: A\n');
      const broken = writeConfig('b.cfg', '- not\n- a map\n');

      const registry = await createRegistry();

      expect(registry.listNames()).toEqual(['A']);
      expect(registry.loadReport.skippedFiles).toEqual([broken]);
      expect(console.warn).toHaveBeenCalledTimes(1);
      expect(console.warn).toHaveBeenCalledWith(
        `[ServerRegistry] Skipping ${broken}: Failed to parse server configuration ${broken}: no server configuration found`
      );
    });

    it('should skip a configuration file that cannot be opened', async () => {
      writeConfig('a.cfg', 'ServerName: A\n');
      const vanished = writeConfig('b.cfg', 'ServerName: B\n');
      const loader = new ConfigFileLoader();
      const loadFromFile = loader.loadFromFile.bind(loader);
      vi.spyOn(loader, 'loadFromFile').mockImplementation(async (filePath) => {
        if (filePath === vanished) fs.rmSync(filePath);
        return loadFromFile(filePath);
      });

      const registry = await ServerRegistry.create({
        store: seededStore([]),
        loader,
        connectionFactory: fakes.factory,
        errorSurface,
        config: { serverDirectory }
      });

      expect(registry.listNames()).toEqual(['A']);
      expect(registry.loadReport).toEqual({ source: 'directory', count: 1, skippedFiles: [vanished], restoreFailure: undefined });
      expect(console.warn).toHaveBeenCalledTimes(1);
      expect(console.warn).toHaveBeenCalledWith(
        expect.stringContaining(`[ServerRegistry] Skipping ${vanished}: Server configuration file is not readable: ${vanished}: ENOENT`)
      );
    });

    it('should fall back to the built-in server when the server directory cannot be listed', async () => {
      serverDirectory = path.join(testDir, 'servers.cfg');
      fs.writeFileSync(serverDirectory, 'ServerName: NotADirectory\n');

      const registry = await createRegistry();

      expect(registry.listNames()).toEqual(['Local']);
      expect(registry.loadReport).toEqual({ source: 'default', count: 1, skippedFiles: [], restoreFailure: undefined });
      expect(reported).toEqual([]);
      expect(console.warn).toHaveBeenCalledTimes(1);
      expect(console.warn).toHaveBeenCalledWith(
        expect.stringContaining(`[ServerRegistry] Cannot list server directory ${serverDirectory}: ENOTDIR`)
      );
    });

    it('should ignore subdirectories named like configuration files', async () => {
      fs.mkdirSync(path.join(serverDirectory, 'nested.cfg'), { recursive: true });
      writeConfig('a.cfg', 'ServerName: A\n');

      const registry = await createRegistry();

      expect(registry.listNames()).toEqual(['A']);
    });

    it('should fall back to the built-in server when nothing else yields servers', async () => {
      const store = seededStore([]);

      const registry = await createRegistry(store);

      expect(registry.listNames()).toEqual(['Local']);
      expect(registry.configuration('Local')?.connection).toBe('Local');
      expect(registry.loadReport).toEqual({ source: 'default', count: 1, skippedFiles: [], restoreFailure: undefined });
      expect(store.writes).toBe(0);
      expect(reported).toEqual([]);
    });

    it('should fall back to the built-in server when every file is invalid', async () => {
      const broken = writeConfig('broken.cfg', 'Connection: SSH\n');

      const registry = await createRegistry();

      expect(registry.listNames()).toEqual(['Local']);
      expect(registry.loadReport.skippedFiles).toEqual([broken]);
    });

    it('should report an invalid saved entry and discard the whole saved list', async () => {
      const store = new MemoryPreferenceStore([{ ServerName: 'alpha' }, { Connection: 'SSH' }]);

      const registry = await createRegistry(store);

      expect(reported).toEqual([
        'Problem loading servers from preferences: Invalid server at position 2: Invalid server configuration: ServerName: Required'
      ]);
      expect(registry.listNames()).toEqual(['Local']);
      expect(fakes.byName('alpha')[0].destroys).toBe(1);
      expect(registry.loadReport.restoreFailure).toBe(reported[0]);
    });

    it('should treat duplicate saved names as a restore failure', async () => {
      writeConfig('a.cfg', 'ServerName: A\n');

      const registry = await createRegistry(seededStore(['alpha', 'alpha']));

      expect(reported).toEqual(['Problem loading servers from preferences: Duplicate server name "alpha"']);
      expect(registry.listNames()).toEqual(['A']);
      expect(registry.loadReport.source).toBe('directory');
    });

    it('should treat an unnamed saved server as a restore failure', async () => {
      await createRegistry(seededStore(['']));

      expect(reported).toEqual(['Problem loading servers from preferences: Server at position 1 has no name']);
    });

    it('should report an unreadable preferences file once', async () => {
      const preferencesPath = path.join(testDir, 'preferences.json');
      fs.writeFileSync(preferencesPath, '{ not json');

      const registry = await ServerRegistry.create({
        store: new JsonPreferenceStore(preferencesPath),
        connectionFactory: fakes.factory,
        errorSurface,
        config: { serverDirectory }
      });

      expect(reported).toHaveLength(1);
      expect(reported[0].startsWith('Problem loading servers from preferences: Preferences file is not valid JSON')).toBe(true);
      expect(registry.listNames()).toEqual(['Local']);
    });

    it('should reject invalid registry configuration', async () => {
      await expect(ServerRegistry.create({ config: { connectTimeoutMs: 0 } }))
        .rejects.toThrow(ConfigurationError);
    });
  });

  describe('Process-wide instance', () => {
    afterEach(() => {
      ServerRegistry.teardown();
    });

    it('should construct once and share the instance', async () => {
      ServerRegistry.configure({
        store: seededStore(['alpha']),
        connectionFactory: fakes.factory,
        config: { serverDirectory }
      });

      const [first, second] = await Promise.all([ServerRegistry.instance(), ServerRegistry.instance()]);
      const third = await ServerRegistry.instance();

      expect(first).toBe(second);
      expect(first).toBe(third);
      expect(fakes.connections).toHaveLength(1);
    });

    it('should refuse reconfiguration while an instance exists', async () => {
      ServerRegistry.configure({ store: seededStore(['alpha']), connectionFactory: fakes.factory, config: { serverDirectory } });
      await ServerRegistry.instance();

      expect(() => ServerRegistry.configure({})).toThrow(ConfigurationError);
    });

    it('should destroy the instance on teardown and build a fresh one afterwards', async () => {
      ServerRegistry.configure({ store: seededStore(['alpha']), connectionFactory: fakes.factory, config: { serverDirectory } });
      const first = await ServerRegistry.instance();

      ServerRegistry.teardown();
      const second = await ServerRegistry.instance();

      expect(second).not.toBe(first);
      expect(fakes.connections.map(c => c.destroys)).toEqual([1, 0]);
      expect(second.listNames()).toEqual(['alpha']);
    });

    it('should tolerate teardown without an instance', () => {
      expect(() => {
        ServerRegistry.teardown();
        ServerRegistry.teardown();
      }).not.toThrow();
    });

    it('should destroy an instance torn down while loading', async () => {
      ServerRegistry.configure({ store: seededStore(['alpha']), connectionFactory: fakes.factory, config: { serverDirectory } });

      const pending = ServerRegistry.instance();
      ServerRegistry.teardown();

      await expect(pending).rejects.toThrow('Server registry was torn down while loading');
      expect(fakes.connections.map(c => c.destroys)).toEqual([1]);
    });

    it('should stop the directory scan of an instance torn down while loading', async () => {
      const store = seededStore([]);
      writeConfig('a.cfg', 'ServerName: A\n');
      ServerRegistry.configure({ store, connectionFactory: fakes.factory, config: { serverDirectory } });

      const pending = ServerRegistry.instance();
      ServerRegistry.teardown();

      await expect(pending).rejects.toThrow(RegistryError);
      expect(store.writes).toBe(0);
      expect(fakes.connections).toHaveLength(0);

      const fresh = await ServerRegistry.instance();
      expect(fresh.listNames()).toEqual(['A']);
      expect(store.writes).toBe(1);
    });

    it('should allow a retry after a failed construction', async () => {
      ServerRegistry.configure({ config: { connectTimeoutMs: 0 } });
      await expect(ServerRegistry.instance()).rejects.toThrow(ConfigurationError);

      ServerRegistry.configure({ store: seededStore(['alpha']), connectionFactory: fakes.factory, config: { serverDirectory } });
      const registry = await ServerRegistry.instance();

      expect(registry.listNames()).toEqual(['alpha']);
    });
  });
});
