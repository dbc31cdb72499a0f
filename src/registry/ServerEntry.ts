/**
 * Server Entry
 *
 * Runtime object owned by the registry: one configuration plus its live
 * connection. Callers only ever see entries through handles.
 */

import { v4 as uuidv4 } from 'uuid';
import type { ConnectionState, ServerConnection, ServerHandle } from '../types/index.js';
import { RegistryError } from '../utils/errors.js';
import type { ServerConfiguration } from './ServerConfiguration.js';

export type ConnectionFactory = (configuration: ServerConfiguration) => ServerConnection;

export class ServerEntry {
  readonly handle: ServerHandle;
  private readonly config: ServerConfiguration;
  private readonly connection: ServerConnection;
  private destroyed = false;

  constructor(configuration: ServerConfiguration, connectionFactory: ConnectionFactory) {
    this.handle = Object.freeze({ id: uuidv4() });
    this.config = configuration.clone();
    this.connection = connectionFactory(this.config.clone());
  }

  get name(): string {
    return this.config.name;
  }

  /** Copy of the configuration; editing it does not affect the entry */
  get configuration(): ServerConfiguration {
    return this.config.clone();
  }

  get connectionState(): ConnectionState {
    return this.connection.state;
  }

  get isDestroyed(): boolean {
    return this.destroyed;
  }

  async open(): Promise<void> {
    this.assertUsable('open');
    await this.connection.open();
  }

  async close(): Promise<void> {
    this.assertUsable('close');
    await this.connection.close();
  }

  /**
   * Release the connection. Only the registry calls this, once, at teardown.
   */
  destroy(): void {
    if (this.destroyed) return;
    this.destroyed = true;
    this.connection.destroy();
  }

  private assertUsable(operation: string): void {
    if (this.destroyed) {
      throw new RegistryError(
        `Cannot ${operation} destroyed server entry: ${this.name}`,
        'ENTRY_DESTROYED',
        { id: this.handle.id, name: this.name }
      );
    }
  }
}
