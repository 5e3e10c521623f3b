import { McpServer, ResourceTemplate } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ReadResourceResult } from '@modelcontextprotocol/sdk/types.js';

import { classifyContent } from './contentClassifier.js';
import { ToolInputError } from './errors.js';
import { resolveContentType } from './mime.js';
import type { RemoteTool, ToolContext } from './tools.js';

export const SERVICE_NAME = 'mcp-ftp';
export const SERVICE_VERSION = '0.1.0';

async function readFileResource(context: ToolContext, uri: URL): Promise<ReadResourceResult> {
  const requested = uri.searchParams.getAll('path');
  if (requested.length > 1) {
    throw new ToolInputError('Only one path may be read at a time');
  }
  const remotePath = context.service.resolvePath(requested[0]);
  const bytes = await context.service.download(remotePath);
  const classification = classifyContent(bytes);
  return {
    contents: [
      {
        uri: uri.href,
        mimeType: resolveContentType(remotePath, classification.isText),
        blob: bytes.toString('base64'),
      },
    ],
  };
}

/** A fresh server per HTTP request; the endpoint keeps no MCP session state. */
export function createMcpServer(tools: readonly RemoteTool[], context: ToolContext): McpServer {
  const server = new McpServer({ name: SERVICE_NAME, version: SERVICE_VERSION });

  for (const tool of tools) {
    server.registerTool(
      tool.name,
      {
        description: tool.description,
        inputSchema: tool.inputSchema,
        annotations: tool.annotations,
      },
      (args) => tool.invoke(args, context),
    );
  }

  server.registerResource(
    'ftp_file',
    new ResourceTemplate('resource://ftp/file{?path}', { list: undefined }),
    {
      description: 'Reads a remote file; the path query argument is resolved against the configured root.',
      mimeType: 'application/octet-stream',
    },
    (uri) => readFileResource(context, uri),
  );

  return server;
}
