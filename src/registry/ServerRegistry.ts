/**
 * Server Registry
 *
 * Process-wide registry of remote server configurations.
 * Features:
 * - Ordered active list with unique names (collisions get `_1`, `_2`, ... suffixes)
 * - Persistence of the active list after every mutation
 * - Three-tier load: saved preferences, then *.cfg directory scan, then a built-in default
 * - Two-phase removal: removed entries are retired and only destroyed at teardown,
 *   so handles held by callers never dangle
 */

import fs, { promises as fsp } from 'fs';
import path from 'path';
import { createRegistryConfig, validateRegistryConfig, type RegistryConfig } from '../config/registry.js';
import type { ErrorSurface, LoadReport, ServerHandle, TierResult } from '../types/index.js';
import {
  ConfigurationError,
  PersistenceError,
  RegistryError,
  RestoreFailureError,
  formatError,
  toError
} from '../utils/errors.js';
import { ConfigFileLoader } from './ConfigFileLoader.js';
import { JsonPreferenceStore, type PreferenceStore } from './PreferenceStore.js';
import { FALLBACK_SERVER_NAME, ServerConfiguration } from './ServerConfiguration.js';
import { ServerEntry, type ConnectionFactory } from './ServerEntry.js';
import { socketConnectionFactory } from './SocketConnection.js';

export const CONFIG_FILE_SUFFIX = '.cfg';

/**
 * Options for ServerRegistry construction
 */
export interface ServerRegistryOptions {
  /** Overrides for the environment configuration (paths, timeouts) */
  config?: Partial<RegistryConfig>;
  /** Saved server list (default: JSON file at config.preferencesPath) */
  store?: PreferenceStore;
  /** Reads *.cfg files during the directory scan (default: YAML loader) */
  loader?: ConfigFileLoader;
  /** Builds the connection of each entry (default: TCP sockets) */
  connectionFactory?: ConnectionFactory;
  /** Receives the preference restore failure (default: stderr) */
  errorSurface?: ErrorSurface;
}

const consoleErrorSurface: ErrorSurface = {
  report(message: string): void {
    console.error(`[ServerRegistry] ${message}`);
  }
};

export class ServerRegistry {
  private static current: Promise<ServerRegistry> | null = null;
  private static resolved: ServerRegistry | null = null;
  private static loading: ServerRegistry | null = null;
  private static pendingOptions: ServerRegistryOptions = {};

  private readonly entries: Map<string, ServerEntry> = new Map();
  private active: string[] = [];
  private retired: string[] = [];
  private tornDown = false;
  private report: LoadReport = { source: 'default', count: 0, skippedFiles: [] };
  private saveError: PersistenceError | null = null;

  private readonly store: PreferenceStore;
  private readonly serverDirectory: string;
  private readonly loader: ConfigFileLoader;
  private readonly connectionFactory: ConnectionFactory;
  private readonly errorSurface: ErrorSurface;

  private constructor(options: ServerRegistryOptions) {
    const config = createRegistryConfig(options.config);
    const problems = validateRegistryConfig(config);
    if (problems.length > 0) {
      throw new ConfigurationError(`Invalid registry configuration: ${problems.join(' ')}`, { problems });
    }

    this.store = options.store ?? new JsonPreferenceStore(config.preferencesPath);
    this.serverDirectory = config.serverDirectory;
    this.loader = options.loader ?? new ConfigFileLoader();
    this.connectionFactory = options.connectionFactory ?? socketConnectionFactory({ timeoutMs: config.connectTimeoutMs });
    this.errorSurface = options.errorSurface ?? consoleErrorSurface;
  }

  // ==========================================================================
  // PROCESS-WIDE INSTANCE
  // ==========================================================================

  /**
   * Set the options of the process-wide registry. Must run before the first
   * `instance()` call (or after `teardown()`).
   */
  static configure(options: ServerRegistryOptions): void {
    if (ServerRegistry.current !== null) {
      throw new ConfigurationError('Server registry is already initialized');
    }
    ServerRegistry.pendingOptions = options;
  }

  /**
   * The process-wide registry, constructed and loaded on first use.
   * Concurrent first callers share one construction. Rejects with
   * REGISTRY_TORN_DOWN when `teardown()` runs before loading finished.
   */
  static instance(): Promise<ServerRegistry> {
    if (ServerRegistry.current === null) {
      let registry: ServerRegistry;
      try {
        registry = new ServerRegistry(ServerRegistry.pendingOptions);
      } catch (err) {
        return Promise.reject(err);
      }

      ServerRegistry.loading = registry;
      const pending: Promise<ServerRegistry> = registry.load().then(
        () => {
          if (ServerRegistry.loading === registry) ServerRegistry.loading = null;
          if (registry.tornDown) {
            throw new RegistryError('Server registry was torn down while loading', 'REGISTRY_TORN_DOWN');
          }
          ServerRegistry.resolved = registry;
          return registry;
        },
        (err: unknown) => {
          if (ServerRegistry.loading === registry) ServerRegistry.loading = null;
          if (ServerRegistry.current === pending) ServerRegistry.current = null;
          registry.teardown();
          throw err;
        }
      );
      ServerRegistry.current = pending;
    }
    return ServerRegistry.current;
  }

  /**
   * Destroy the process-wide registry and release it. The next `instance()`
   * builds a fresh one. A registry still loading stops at its next step and
   * writes nothing. Safe to call when nothing was ever constructed.
   */
  static teardown(): void {
    const registry = ServerRegistry.resolved ?? ServerRegistry.loading;
    ServerRegistry.resolved = null;
    ServerRegistry.loading = null;
    ServerRegistry.current = null;
    registry?.teardown();
  }

  /**
   * Construct and load a registry that is not the process-wide one
   */
  static async create(options: ServerRegistryOptions = {}): Promise<ServerRegistry> {
    const registry = new ServerRegistry(options);
    await registry.load();
    return registry;
  }

  // ==========================================================================
  // QUERIES
  // ==========================================================================

  /** Active server names in display order */
  listNames(): string[] {
    return this.activeEntries().map(entry => entry.name);
  }

  /** Names of removed entries awaiting teardown */
  listRetiredNames(): string[] {
    return this.entriesOf(this.retired).map(entry => entry.name);
  }

  find(name: string): ServerHandle | undefined {
    return this.activeEntries().find(entry => entry.name === name)?.handle;
  }

  /**
   * Read an entry by handle. Retired entries stay readable until teardown.
   */
  entry(handle: ServerHandle): ServerEntry | undefined {
    return this.entries.get(handle.id);
  }

  isActive(handle: ServerHandle): boolean {
    return this.active.includes(handle.id);
  }

  /** Copy of an active server's configuration */
  configuration(name: string): ServerConfiguration | undefined {
    const handle = this.find(name);
    return handle ? this.entry(handle)?.configuration : undefined;
  }

  get size(): number {
    return this.active.length;
  }

  get loadReport(): LoadReport {
    return { ...this.report, skippedFiles: [...this.report.skippedFiles] };
  }

  /** Failure of the most recent save, cleared by the next successful one */
  get lastSaveError(): PersistenceError | null {
    return this.saveError;
  }

  // ==========================================================================
  // MUTATIONS
  // ==========================================================================

  /**
   * Register a server. A name already in use gets the lowest free numeric
   * suffix (`name_1`, `name_2`, ...). The caller's configuration is not
   * modified.
   */
  add(config: ServerConfiguration): ServerHandle {
    if (this.tornDown) {
      throw new RegistryError('Cannot add a server to a torn down registry', 'REGISTRY_TORN_DOWN');
    }

    const base = config.name.trim() === '' ? FALLBACK_SERVER_NAME : config.name;
    let name = base;
    let count = 0;
    while (this.find(name) !== undefined) {
      ++count;
      name = `${base}_${count}`;
    }

    const entry = new ServerEntry(config.withName(name), this.connectionFactory);
    this.entries.set(entry.handle.id, entry);
    this.active.push(entry.handle.id);
    this.save();

    return entry.handle;
  }

  /**
   * Retire an active server by name or handle. The entry itself survives
   * until teardown.
   * @returns whether an entry was retired
   */
  remove(target: string | ServerHandle): boolean {
    const id = typeof target === 'string' ? this.find(target)?.id : target.id;
    const index = id === undefined ? -1 : this.active.indexOf(id);
    if (index >= 0) {
      this.retired.push(...this.active.splice(index, 1));
    }
    this.save();
    return index >= 0;
  }

  /** @returns whether the server moved */
  moveUp(name: string): boolean {
    const index = this.indexOf(name);
    const moved = index > 0;
    if (moved) this.swap(index, index - 1);
    this.save();
    return moved;
  }

  /** @returns whether the server moved */
  moveDown(name: string): boolean {
    const index = this.indexOf(name);
    const moved = index >= 0 && index < this.active.length - 1;
    if (moved) this.swap(index, index + 1);
    this.save();
    return moved;
  }

  // ==========================================================================
  // CONNECTIONS
  // ==========================================================================

  /**
   * Close every active connection. Failures are logged, never thrown.
   */
  async closeAllConnections(): Promise<void> {
    const entries = this.activeEntries();
    const results = await Promise.allSettled(entries.map(entry => entry.close()));

    results.forEach((result, i) => {
      if (result.status === 'rejected') {
        console.warn(`[ServerRegistry] Failed to close ${entries[i].name}: ${formatError(result.reason)}`);
      }
    });
  }

  /**
   * Open the named servers in the given order. Unknown names are skipped.
   */
  async connectServers(names: string[]): Promise<void> {
    for (const name of names) {
      const handle = this.find(name);
      const entry = handle ? this.entry(handle) : undefined;
      if (!entry) continue;

      try {
        await entry.open();
      } catch (err) {
        console.warn(`[ServerRegistry] Failed to open ${name}: ${formatError(err)}`);
      }
    }
  }

  // ==========================================================================
  // LIFECYCLE & PERSISTENCE
  // ==========================================================================

  /**
   * Destroy every active and retired entry exactly once. Later calls are no-ops.
   */
  teardown(): void {
    if (this.tornDown) return;
    this.tornDown = true;

    for (const entry of this.entriesOf([...this.active, ...this.retired])) {
      entry.destroy();
    }
    this.entries.clear();
    this.active = [];
    this.retired = [];
  }

  /**
   * Write the active list, in order, to the preference store.
   * @returns false when the write failed (see lastSaveError)
   */
  save(): boolean {
    if (this.tornDown) return false;

    try {
      this.store.write(this.activeEntries().map(entry => entry.configuration.toJSON()));
      this.saveError = null;
      return true;
    } catch (err) {
      this.saveError = err instanceof PersistenceError
        ? err
        : new PersistenceError(`Failed to save server list: ${toError(err).message}`);
      console.warn(`[ServerRegistry] ${formatError(this.saveError)}`);
      return false;
    }
  }

  private async load(): Promise<void> {
    const restored = this.restoreFromPreferences();
    if (restored.ok && restored.count > 0) {
      this.report = { source: 'preferences', count: restored.count, skippedFiles: [] };
      return;
    }

    let restoreFailure: string | undefined;
    if (!restored.ok) {
      restoreFailure = `Problem loading servers from preferences: ${restored.reason}`;
      this.errorSurface.report(restoreFailure);
    }

    const skippedFiles: string[] = [];
    const scanned = await this.scanServerDirectory(skippedFiles);
    if (this.tornDown) return;
    if (scanned.ok && scanned.count > 0) {
      this.report = { source: 'directory', count: scanned.count, skippedFiles, restoreFailure };
      return;
    }

    this.append(new ServerEntry(new ServerConfiguration(), this.connectionFactory));
    this.report = { source: 'default', count: 1, skippedFiles, restoreFailure };
  }

  /**
   * Tier 1: rebuild the saved list. Any invalid item rejects the whole list.
   */
  private restoreFromPreferences(): TierResult {
    const restored: ServerEntry[] = [];

    try {
      const saved = this.store.read();
      const names = new Set<string>();

      saved.forEach((item, index) => {
        let configuration: ServerConfiguration;
        try {
          configuration = ServerConfiguration.fromSerialized(item);
        } catch (err) {
          throw new RestoreFailureError(`Invalid server at position ${index + 1}: ${toError(err).message}`);
        }

        const name = configuration.name;
        if (name.trim() === '') {
          throw new RestoreFailureError(`Server at position ${index + 1} has no name`);
        }
        if (names.has(name)) {
          throw new RestoreFailureError(`Duplicate server name "${name}"`);
        }
        names.add(name);
        restored.push(new ServerEntry(configuration, this.connectionFactory));
      });
    } catch (err) {
      // Never registered, so no handle can refer to them
      for (const entry of restored) entry.destroy();
      return { ok: false, reason: toError(err).message };
    }

    for (const entry of restored) this.append(entry);
    return { ok: true, count: restored.length };
  }

  /**
   * Tier 2: add every readable *.cfg file of the server directory.
   * Files that fail to load are skipped.
   */
  private async scanServerDirectory(skippedFiles: string[]): Promise<TierResult> {
    const dir = this.serverDirectory;
    console.debug(`[ServerRegistry] Server directory set to: ${dir}`);
    if (!fs.existsSync(dir)) {
      return { ok: true, count: 0 };
    }

    let files: string[];
    try {
      const listing = await fsp.readdir(dir, { withFileTypes: true });
      files = listing
        .filter(dirent => dirent.isFile() && dirent.name.endsWith(CONFIG_FILE_SUFFIX))
        .map(dirent => dirent.name)
        .sort();
    } catch (err) {
      console.warn(`[ServerRegistry] Cannot list server directory ${dir}: ${formatError(err)}`);
      return { ok: false, reason: toError(err).message };
    }

    let count = 0;
    for (const file of files) {
      if (this.tornDown) break;
      const filePath = path.join(dir, file);
      console.debug(`[ServerRegistry] Reading server configuration from: ${filePath}`);

      const result = await this.loader.loadFromFile(filePath);
      if (this.tornDown) break;
      if (result.ok) {
        this.add(result.configuration);
        count++;
      } else {
        skippedFiles.push(filePath);
        console.warn(`[ServerRegistry] Skipping ${filePath}: ${result.error.message}`);
      }
    }

    return { ok: true, count };
  }

  private append(entry: ServerEntry): void {
    this.entries.set(entry.handle.id, entry);
    this.active.push(entry.handle.id);
  }

  private indexOf(name: string): number {
    return this.activeEntries().findIndex(entry => entry.name === name);
  }

  private swap(i: number, j: number): void {
    [this.active[i], this.active[j]] = [this.active[j], this.active[i]];
  }

  private activeEntries(): ServerEntry[] {
    return this.entriesOf(this.active);
  }

  private entriesOf(ids: string[]): ServerEntry[] {
    return ids.flatMap(id => {
      const entry = this.entries.get(id);
      return entry ? [entry] : [];
    });
  }
}
