/**
 * Basic Usage Example
 *
 * Demonstrates core functionality of the server registry.
 */

import os from 'os';
import path from 'path';
import {
  MemoryPreferenceStore,
  ServerConfiguration,
  ServerRegistry
} from '../src/index.js';

async function main() {
  // Keep the demo away from the real preferences file
  ServerRegistry.configure({
    store: new MemoryPreferenceStore(),
    config: { serverDirectory: path.join(os.tmpdir(), 'server-registry-demo') }
  });

  const registry = await ServerRegistry.instance();

  console.log('=== Server Registry Demo ===\n');

  // Example 1: Nothing saved and no *.cfg files, so the built-in server is used
  console.log('1. Loaded servers:');
  console.log(`   Source: ${registry.loadReport.source}`);
  console.log(`   Servers: ${registry.listNames().join(', ')}\n`);

  // Example 2: Colliding names get a numeric suffix
  console.log('2. Adding two servers named "cluster":');
  const cluster = new ServerConfiguration({
    ServerName: 'cluster',
    Connection: 'SSH',
    HostAddress: 'cluster.example.org',
    QueueSystem: 'SLURM',
    Authentication: 'Agent',
    UserName: 'demo'
  });
  registry.add(cluster);
  const second = registry.add(cluster);
  console.log(`   Second entry registered as: ${registry.entry(second)?.name}`);
  console.log(`   Servers: ${registry.listNames().join(', ')}\n`);

  // Example 3: Reordering
  console.log('3. Moving "cluster_1" up:');
  registry.moveUp('cluster_1');
  console.log(`   Servers: ${registry.listNames().join(', ')}\n`);

  // Example 4: Handles survive removal until teardown
  console.log('4. Removing "cluster":');
  const handle = registry.find('cluster');
  registry.remove('cluster');
  console.log(`   Servers: ${registry.listNames().join(', ')}`);
  console.log(`   Removed entry still readable: ${handle ? registry.entry(handle)?.name : 'n/a'}\n`);

  // Example 5: Open the local server
  console.log('5. Connecting "Local":');
  await registry.connectServers(['Local']);
  const local = registry.find('Local');
  console.log(`   State: ${local ? registry.entry(local)?.connectionState : 'missing'}\n`);

  await registry.closeAllConnections();
  ServerRegistry.teardown();
  console.log('=== Demo Complete ===');
}

main().catch((error) => {
  console.error(error);
  ServerRegistry.teardown();
  process.exit(1);
});
