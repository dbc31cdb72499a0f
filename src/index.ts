/**
 * Server Registry
 *
 * Process-wide registry of remote execution server configurations:
 * - Unique, ordered server list with suffix-based name de-duplication
 * - Persistence to a preference store after every change
 * - Loading from saved preferences, a *.cfg directory, or a built-in default
 * - Deferred destruction of removed servers
 *
 * @module server-registry
 */

// Core types
export * from './types/index.js';

// Registry components
export {
  ServerRegistry,
  CONFIG_FILE_SUFFIX,
  type ServerRegistryOptions,
  ServerConfiguration,
  FALLBACK_SERVER_NAME,
  ServerEntry,
  type ConnectionFactory,
  ConfigFileLoader,
  type LoadResult,
  YamlFileParser,
  YamlDocument,
  parseYamlSource,
  JsonPreferenceStore,
  MemoryPreferenceStore,
  SERVER_LIST_KEY,
  type PreferenceStore,
  SocketConnection,
  socketConnectionFactory,
  type SocketConnectionOptions
} from './registry/index.js';

// Configuration
export * from './config/index.js';

// Errors
export * from './utils/errors.js';

// MCP Server
export { server, startServer, handleToolCall, tools, type ToolResult } from './server.js';
