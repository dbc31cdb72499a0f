/**
 * Server Configuration
 *
 * Value type holding the named attribute set of one remote server.
 * Instances are copied, never shared: every accessor that hands out
 * attributes returns a fresh object.
 */

import type { ZodError } from 'zod';
import {
  ServerAttributesSchema,
  type AttributeValue,
  type ConnectionKind,
  type QueueSystem,
  type ServerAttributes,
  type SerializedServerConfiguration,
  type StructuredNodeOf
} from '../types/index.js';
import { InvalidConfigurationError } from '../utils/errors.js';

/** Name given to servers whose configuration carries an empty name */
export const FALLBACK_SERVER_NAME = 'Server';

const DEFAULT_ATTRIBUTES: ServerAttributes = {
  ServerName: 'Local',
  Connection: 'Local',
  QueueSystem: 'Basic',
  HostAddress: 'localhost'
};

const DEFAULT_PORTS: Record<ConnectionKind, number> = {
  Local: 0,
  SSH: 22,
  SFTP: 22,
  HTTP: 80,
  HTTPS: 443
};

function describeIssues(error: ZodError): string[] {
  return error.issues.map(issue => {
    const field = issue.path.length > 0 ? issue.path.join('.') : 'configuration';
    return `${field}: ${issue.message}`;
  });
}

function validate(input: unknown): ServerAttributes {
  const result = ServerAttributesSchema.safeParse(input);
  if (!result.success) {
    throw new InvalidConfigurationError(describeIssues(result.error));
  }
  return result.data;
}

export class ServerConfiguration {
  private attributes: ServerAttributes;

  /**
   * Without arguments this is the built-in default server (a local machine
   * with the basic queue system).
   */
  constructor(attributes: ServerAttributes = DEFAULT_ATTRIBUTES) {
    this.attributes = validate(attributes);
  }

  /**
   * Build from a serialized record, e.g. an item of the saved server list.
   * @throws InvalidConfigurationError when the record is not a valid attribute set
   */
  static fromSerialized(value: unknown): ServerConfiguration {
    return new ServerConfiguration(validate(value));
  }

  /**
   * Build from the top-level map of a parsed configuration file.
   * @throws InvalidConfigurationError when the map is not a valid attribute set
   */
  static fromNode(node: StructuredNodeOf<'map'>): ServerConfiguration {
    const name = node.value.ServerName;
    // YAML reads names such as 2024 or true as scalars of another type
    const value = typeof name === 'number' || typeof name === 'boolean'
      ? { ...node.value, ServerName: String(name) }
      : node.value;
    return new ServerConfiguration(validate(value));
  }

  get name(): string {
    return this.attributes.ServerName;
  }

  get connection(): ConnectionKind {
    return this.attributes.Connection ?? 'Local';
  }

  get queueSystem(): QueueSystem {
    return this.attributes.QueueSystem ?? 'Basic';
  }

  get hostAddress(): string {
    return this.attributes.HostAddress ?? 'localhost';
  }

  /** Explicit port, else the conventional port of the connection kind */
  get port(): number {
    return this.attributes.Port ?? DEFAULT_PORTS[this.connection];
  }

  value(key: string): AttributeValue | undefined {
    return this.attributes[key];
  }

  /**
   * Set one attribute. The resulting attribute set is validated before it
   * replaces the current one.
   */
  setValue(key: string, value: AttributeValue): void {
    this.attributes = validate({ ...this.attributes, [key]: value });
  }

  /** Copy with a different server name */
  withName(name: string): ServerConfiguration {
    const copy = this.clone();
    copy.setValue('ServerName', name);
    return copy;
  }

  clone(): ServerConfiguration {
    return new ServerConfiguration({ ...this.attributes });
  }

  equals(other: ServerConfiguration): boolean {
    const mine = Object.entries(this.attributes);
    const theirs = other.toJSON();
    if (mine.length !== Object.keys(theirs).length) return false;
    return mine.every(([key, value]) => theirs[key] === value);
  }

  toJSON(): SerializedServerConfiguration {
    return { ...this.attributes };
  }
}
