#!/usr/bin/env node
/**
 * voxel-tracer MCP Server
 *
 * Wraps the voxel ray tracer as 16 callable tools for LLM agents:
 * build a scene, move the camera and the sun, render frames to PPM.
 * Runs over stdio transport.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { registerTools, outputDir } from './tools.js';
import { attachLogger, log } from './log.js';

const server = new McpServer(
  { name: 'voxel-tracer', version: '0.1.0' },
  { capabilities: { logging: {} } },
);

registerTools(server);
attachLogger(server);

try {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  log('info', { event: 'started', output_dir: outputDir() });
} catch (err) {
  process.stderr.write(`voxel-tracer: failed to start: ${err instanceof Error ? err.message : String(err)}\n`);
  process.exit(1);
}
