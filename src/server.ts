/**
 * Server Registry - MCP Server
 *
 * Model Context Protocol server exposing the server registry as tools.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  ListResourcesRequestSchema,
  ReadResourceRequestSchema,
  type CallToolRequest,
  type Tool
} from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { ServerRegistry } from './registry/ServerRegistry.js';
import { ServerConfiguration } from './registry/ServerConfiguration.js';
import { ServerAttributesSchema } from './types/index.js';
import { formatError } from './utils/errors.js';

const NameArgsSchema = z.object({ name: z.string().min(1) });
const NamesArgsSchema = z.object({ names: z.array(z.string()) });
const AddServerArgsSchema = z.object({ configuration: ServerAttributesSchema });
const NoArgsSchema = z.object({}).passthrough();

const serverNameProperty = { type: 'string', description: 'Exact server name' };

// Define MCP tools
export const tools: Tool[] = [
  {
    name: 'list_servers',
    description: 'List configured servers in display order with their connection details and state.',
    inputSchema: { type: 'object', properties: {} }
  },
  {
    name: 'get_server',
    description: 'Get the full configuration of one server.',
    inputSchema: {
      type: 'object',
      properties: { name: serverNameProperty },
      required: ['name']
    }
  },
  {
    name: 'add_server',
    description: `Register a server configuration.

A name already in use gets a numeric suffix (name_1, name_2, ...). Returns the name actually registered.`,
    inputSchema: {
      type: 'object',
      properties: {
        configuration: {
          type: 'object',
          description: 'Server attributes',
          properties: {
            ServerName: { type: 'string' },
            Connection: { type: 'string', enum: ['Local', 'SSH', 'SFTP', 'HTTP', 'HTTPS'] },
            QueueSystem: { type: 'string', enum: ['Basic', 'PBS', 'SGE', 'SLURM', 'Web'] },
            HostAddress: { type: 'string' },
            Port: { type: 'number' },
            Authentication: {
              type: 'string',
              enum: ['None', 'Agent', 'PublicKey', 'HostBased', 'KeyboardInteractive', 'Password']
            },
            UserName: { type: 'string' },
            WorkingDirectory: { type: 'string' },
            JobLimit: { type: 'number' },
            UpdateInterval: { type: 'number' }
          },
          required: ['ServerName']
        }
      },
      required: ['configuration']
    }
  },
  {
    name: 'remove_server',
    description: 'Remove a server from the registry.',
    inputSchema: {
      type: 'object',
      properties: { name: serverNameProperty },
      required: ['name']
    }
  },
  {
    name: 'move_server_up',
    description: 'Move a server one place earlier in the display order.',
    inputSchema: {
      type: 'object',
      properties: { name: serverNameProperty },
      required: ['name']
    }
  },
  {
    name: 'move_server_down',
    description: 'Move a server one place later in the display order.',
    inputSchema: {
      type: 'object',
      properties: { name: serverNameProperty },
      required: ['name']
    }
  },
  {
    name: 'connect_servers',
    description: 'Open connections to the named servers. Unknown names are ignored.',
    inputSchema: {
      type: 'object',
      properties: { names: { type: 'array', items: { type: 'string' } } },
      required: ['names']
    }
  },
  {
    name: 'close_all_connections',
    description: 'Close the connection of every configured server.',
    inputSchema: { type: 'object', properties: {} }
  },
  {
    name: 'get_load_report',
    description: 'Report where the server list was loaded from and which configuration files were skipped.',
    inputSchema: { type: 'object', properties: {} }
  }
];

export interface ToolResult {
  [key: string]: unknown;
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
}

function ok(value: unknown): ToolResult {
  return { content: [{ type: 'text', text: JSON.stringify(value, null, 2) }] };
}

function fail(message: string): ToolResult {
  return {
    content: [{ type: 'text', text: JSON.stringify({ error: message }, null, 2) }],
    isError: true
  };
}

function describeServers(registry: ServerRegistry) {
  return registry.listNames().map(name => {
    const handle = registry.find(name);
    const entry = handle ? registry.entry(handle) : undefined;
    const configuration = entry?.configuration;
    return {
      name,
      connection: configuration?.connection,
      hostAddress: configuration?.hostAddress,
      port: configuration?.port,
      state: entry?.connectionState
    };
  });
}

/**
 * Execute one tool against a registry
 */
export async function handleToolCall(
  registry: ServerRegistry,
  name: string,
  args: unknown = {}
): Promise<ToolResult> {
  try {
    switch (name) {
      case 'list_servers':
        return ok(describeServers(registry));

      case 'get_server': {
        const { name: serverName } = NameArgsSchema.parse(args);
        const configuration = registry.configuration(serverName);
        if (!configuration) return fail(`Server not found: ${serverName}`);
        return ok(configuration.toJSON());
      }

      case 'add_server': {
        const { configuration } = AddServerArgsSchema.parse(args);
        const handle = registry.add(new ServerConfiguration(configuration));
        return ok({ id: handle.id, name: registry.entry(handle)?.name, servers: registry.listNames() });
      }

      case 'remove_server': {
        const { name: serverName } = NameArgsSchema.parse(args);
        const removed = registry.remove(serverName);
        return ok({ removed, servers: registry.listNames() });
      }

      case 'move_server_up': {
        const { name: serverName } = NameArgsSchema.parse(args);
        const moved = registry.moveUp(serverName);
        return ok({ moved, servers: registry.listNames() });
      }

      case 'move_server_down': {
        const { name: serverName } = NameArgsSchema.parse(args);
        const moved = registry.moveDown(serverName);
        return ok({ moved, servers: registry.listNames() });
      }

      case 'connect_servers': {
        const { names } = NamesArgsSchema.parse(args);
        await registry.connectServers(names);
        return ok(describeServers(registry));
      }

      case 'close_all_connections':
        NoArgsSchema.parse(args);
        await registry.closeAllConnections();
        return ok(describeServers(registry));

      case 'get_load_report':
        return ok(registry.loadReport);

      default:
        return fail(`Unknown tool: ${name}`);
    }
  } catch (error) {
    if (error instanceof z.ZodError) {
      return fail(`Invalid arguments for ${name}: ${error.issues.map(issue => `${issue.path.join('.') || 'arguments'}: ${issue.message}`).join('; ')}`);
    }
    return fail(formatError(error));
  }
}

const server = new Server(
  {
    name: 'server-registry',
    version: '1.0.0'
  },
  {
    capabilities: {
      tools: {},
      resources: {}
    }
  }
);

// List tools handler
server.setRequestHandler(ListToolsRequestSchema, async () => ({
  tools
}));

// List resources handler
server.setRequestHandler(ListResourcesRequestSchema, async () => ({
  resources: [
    {
      uri: 'registry://servers',
      name: 'Configured Servers',
      description: 'Configured servers in display order',
      mimeType: 'application/json'
    }
  ]
}));

// Read resource handler
server.setRequestHandler(ReadResourceRequestSchema, async (request) => {
  const { uri } = request.params;

  switch (uri) {
    case 'registry://servers': {
      const registry = await ServerRegistry.instance();
      return {
        contents: [{
          uri,
          mimeType: 'application/json',
          text: JSON.stringify(describeServers(registry), null, 2)
        }]
      };
    }

    default:
      throw new Error(`Unknown resource: ${uri}`);
  }
});

// Tool execution handler
server.setRequestHandler(CallToolRequestSchema, async (request: CallToolRequest) => {
  const { name, arguments: args } = request.params;
  const registry = await ServerRegistry.instance();
  return handleToolCall(registry, name, args);
});

// Export server and start function
export { server };

export async function startServer(): Promise<void> {
  await ServerRegistry.instance();
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error('Server Registry MCP Server running on stdio');
}
