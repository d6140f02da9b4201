/**
 * Example MCP Streamable HTTP Client
 *
 * Usage:
 *   1. Start the server in streamable mode:
 *      npm run build
 *      node dist/src/index.js --mcp-transport streamable --web true
 *
 *   2. Run this client, optionally with a scene to render:
 *      node dist/examples/streamable-client.js /path/to/scene.hip /out/Redshift_ROP1
 */

import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { StreamableHTTPClientTransport } from '@modelcontextprotocol/sdk/client/streamableHttp.js';

function textOf(result: unknown): string {
  if (typeof result !== 'object' || result === null || !('content' in result) || !Array.isArray(result.content)) {
    return JSON.stringify(result, null, 2);
  }
  const parts: string[] = [];
  for (const item of result.content) {
    if (typeof item === 'object' && item !== null && 'text' in item && typeof item.text === 'string') {
      parts.push(item.text);
    }
  }
  return parts.join('\n');
}

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

async function main() {
  const endpoint = process.env.MCP_URL ?? 'http://localhost:3001/mcp';
  const [hipPath, outNode] = process.argv.slice(2);

  console.log(`Connecting to ${endpoint}...`);
  const transport = new StreamableHTTPClientTransport(new URL(endpoint));
  const client = new Client({ name: 'render-monitor-example-client', version: '1.0.0' }, { capabilities: {} });

  try {
    await client.connect(transport);

    const tools = await client.listTools();
    console.log('Available tools:');
    tools.tools.forEach((tool, index) => {
      console.log(`  ${index + 1}. ${tool.name} - ${tool.description ?? 'No description'}`);
    });

    console.log('\nHealth check:');
    console.log(textOf(await client.callTool({ name: 'health-check', arguments: {} })));

    if (hipPath && outNode) {
      console.log(`\nStarting render of ${outNode} in ${hipPath}`);
      console.log(textOf(await client.callTool({ name: 'start-render', arguments: { hip_path: hipPath, out_node: outNode } })));

      for (let i = 0; i < 10; i++) {
        await sleep(2000);
        console.log(textOf(await client.callTool({ name: 'render-status', arguments: {} })));
      }
    } else {
      console.log('\nRender status:');
      console.log(textOf(await client.callTool({ name: 'render-status', arguments: {} })));
    }

    console.log('\nRecent renders:');
    console.log(textOf(await client.callTool({ name: 'list-renders', arguments: { limit: 5 } })));
  } finally {
    await client.close();
  }
}

main().catch((error) => {
  console.error('Error:', error);
  process.exit(1);
});
