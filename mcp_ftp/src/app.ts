import Fastify from 'fastify';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { z, ZodError } from 'zod';

import { ToolInputError, UnknownToolError } from './errors.js';
import type { Logger } from './logger.js';
import { createMcpServer, SERVICE_NAME, SERVICE_VERSION } from './mcpServer.js';
import type { RemoteFileService } from './remoteFileService.js';
import { findTool, remoteTools } from './tools.js';
import type { TransferProtocol } from './types.js';

type AppDependencies = {
  service: RemoteFileService;
  protocol: TransferProtocol;
  logger: Logger;
};

const invokeBodySchema = z.object({
  tool: z.string().min(1),
  arguments: z.record(z.unknown()).optional(),
});

const ENDPOINTS = ['/health', '/health/remote', '/info', '/invoke', '/mcp'];

const STATELESS_MCP = { error: 'Method not allowed; the MCP endpoint is stateless and only accepts POST' };

export function buildApp({ service, protocol, logger }: AppDependencies) {
  const app = Fastify({ logger });
  const context = { service, protocol };
  const startedAt = Date.now();

  app.setErrorHandler((error, request, reply) => {
    if (error instanceof ZodError) {
      return reply.status(400).send({ error: 'Invalid arguments', issues: error.issues });
    }
    if (error instanceof ToolInputError) {
      return reply.status(400).send({ error: error.message });
    }
    if (error instanceof UnknownToolError) {
      return reply.status(404).send({ error: error.message });
    }
    request.log.error({ err: error }, 'Request failed');
    return reply.status(500).send({ error: error.message });
  });

  app.get('/health', async () => ({ status: 'ok' }));

  // opens a session against the configured server
  app.get('/health/remote', async () => {
    await service.ping();
    return { status: 'ok', protocol, ...service.endpoint };
  });

  app.get('/info', async () => ({
    name: SERVICE_NAME,
    version: SERVICE_VERSION,
    protocol,
    uptimeSeconds: Math.floor((Date.now() - startedAt) / 1000),
    endpoints: ENDPOINTS,
    tools: remoteTools.map((tool) => tool.name),
  }));

  app.post('/invoke', async (request, reply) => {
    const body = invokeBodySchema.parse(request.body);
    const tool = findTool(body.tool);
    if (!tool) {
      throw new UnknownToolError(body.tool);
    }
    const result = await tool.invoke(body.arguments ?? {}, context);
    return reply.send(result);
  });

  app.post('/mcp', async (request, reply) => {
    const server = createMcpServer(remoteTools, context);
    const transport = new StreamableHTTPServerTransport({ sessionIdGenerator: undefined });
    reply.raw.on('close', () => {
      transport.close().catch((error: unknown) => request.log.warn({ err: error }, 'Failed to close MCP transport'));
      server.close().catch((error: unknown) => request.log.warn({ err: error }, 'Failed to close MCP server'));
    });
    reply.hijack();
    await server.connect(transport);
    await transport.handleRequest(request.raw, reply.raw, request.body);
  });

  app.get('/mcp', async (_request, reply) => reply.status(405).send(STATELESS_MCP));
  app.delete('/mcp', async (_request, reply) => reply.status(405).send(STATELESS_MCP));

  return app;
}
