/**
 * Registry module exports
 */

export { ServerRegistry, CONFIG_FILE_SUFFIX, type ServerRegistryOptions } from './ServerRegistry.js';
export { ServerConfiguration, FALLBACK_SERVER_NAME } from './ServerConfiguration.js';
export { ServerEntry, type ConnectionFactory } from './ServerEntry.js';
export { ConfigFileLoader, type LoadResult } from './ConfigFileLoader.js';
export { YamlFileParser, YamlDocument, parseYamlSource } from './YamlFileParser.js';
export {
  JsonPreferenceStore,
  MemoryPreferenceStore,
  SERVER_LIST_KEY,
  type PreferenceStore
} from './PreferenceStore.js';
export { SocketConnection, socketConnectionFactory, type SocketConnectionOptions } from './SocketConnection.js';
