/**
 * Server Registry - Core Types
 *
 * Schemas and type definitions shared by the registry, the configuration
 * file loader and the tool surface.
 */

import { z } from 'zod';

// ============================================================================
// SERVER CONFIGURATION TYPES
// ============================================================================

export const ConnectionKindSchema = z.enum([
  'Local',
  'SSH',
  'SFTP',
  'HTTP',
  'HTTPS'
]);

export type ConnectionKind = z.infer<typeof ConnectionKindSchema>;

export const QueueSystemSchema = z.enum([
  'Basic',
  'PBS',
  'SGE',
  'SLURM',
  'Web'
]);

export type QueueSystem = z.infer<typeof QueueSystemSchema>;

export const AuthenticationSchema = z.enum([
  'None',
  'Agent',
  'PublicKey',
  'HostBased',
  'KeyboardInteractive',
  'Password'
]);

export type Authentication = z.infer<typeof AuthenticationSchema>;

export const AttributeValueSchema = z.union([z.string(), z.number(), z.boolean()]);

export type AttributeValue = z.infer<typeof AttributeValueSchema>;

const knownAttributes = {
  ServerName: z.string(),
  Connection: ConnectionKindSchema.optional(),
  QueueSystem: QueueSystemSchema.optional(),
  HostAddress: z.string().optional(),
  Port: z.number().int().min(0).max(65535).optional(),
  Authentication: AuthenticationSchema.optional(),
  UserName: z.string().optional(),
  WorkingDirectory: z.string().optional(),
  JobLimit: z.number().int().nonnegative().optional(),
  UpdateInterval: z.number().int().positive().optional()
};

/**
 * Attribute record of one server. Unknown scalar attributes are kept as-is.
 * `ServerName` may be empty here; the registry enforces a non-empty name.
 */
export const ServerAttributesSchema = z.object(knownAttributes).catchall(AttributeValueSchema);

export type ServerAttributes = z.infer<typeof ServerAttributesSchema>;

/** Serialized form written to the preference store */
export type SerializedServerConfiguration = ServerAttributes;

// ============================================================================
// REGISTRY TYPES
// ============================================================================

/**
 * Non-owning reference to a registry entry. Holding one never keeps an
 * entry alive or lets the holder destroy it.
 */
export interface ServerHandle {
  readonly id: string;
}

export type LoadTier = 'preferences' | 'directory' | 'default';

export type TierResult =
  | { ok: true; count: number }
  | { ok: false; reason: string };

export interface LoadReport {
  /** Tier that produced the active entries */
  source: LoadTier;
  count: number;
  /** Files the directory scan skipped */
  skippedFiles: string[];
  /** Message sent to the error surface when the preference restore failed */
  restoreFailure?: string;
}

/**
 * User-visible error channel. Receives one message when the preference
 * restore fails.
 */
export interface ErrorSurface {
  report(message: string): void;
}

// ============================================================================
// CONNECTION TYPES
// ============================================================================

export type ConnectionState = 'closed' | 'opening' | 'open' | 'destroyed';

export interface ServerConnection {
  readonly state: ConnectionState;
  open(): Promise<void>;
  close(): Promise<void>;
  /** Release resources synchronously; the connection is unusable afterwards */
  destroy(): void;
}

// ============================================================================
// STRUCTURED FILE PARSER TYPES
// ============================================================================

export type StructuredNodeKind = 'map' | 'sequence' | 'scalar';

export type StructuredNode =
  | { kind: 'map'; value: Record<string, unknown> }
  | { kind: 'sequence'; value: unknown[] }
  | { kind: 'scalar'; value: unknown };

export type StructuredNodeOf<K extends StructuredNodeKind> = Extract<StructuredNode, { kind: K }>;

export interface ParsedDocument {
  errors(): string[];
  findData<K extends StructuredNodeKind>(kind: K): StructuredNodeOf<K>[];
}

/**
 * Parses a file to completion. Awaiting `parse` is the suspension point of
 * the configuration file loader.
 */
export interface StructuredFileParser {
  parse(filePath: string): Promise<ParsedDocument>;
}
