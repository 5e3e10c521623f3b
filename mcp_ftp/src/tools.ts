import path from 'path';

import type { CallToolResult, ToolAnnotations } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';

import { classifyContent } from './contentClassifier.js';
import { encodeText } from './encodings.js';
import { ToolInputError } from './errors.js';
import { formatDownload, formatListing } from './formatters.js';
import { resolveContentType } from './mime.js';
import { buildRemoteUri, siblingPath } from './paths.js';
import type { RemoteFileService } from './remoteFileService.js';
import type { TransferProtocol } from './types.js';

export type ToolContext = {
  service: RemoteFileService;
  protocol: TransferProtocol;
};

type ToolDefinition<Shape extends z.ZodRawShape> = {
  name: string;
  description: string;
  annotations: ToolAnnotations;
  inputSchema: Shape;
  run: (args: z.output<z.ZodObject<Shape>>, context: ToolContext) => Promise<CallToolResult>;
};

/** A tool with its argument type erased; `invoke` validates raw arguments itself. */
export type RemoteTool = {
  name: string;
  description: string;
  annotations: ToolAnnotations;
  inputSchema: z.ZodRawShape;
  invoke: (rawArgs: unknown, context: ToolContext) => Promise<CallToolResult>;
};

function defineTool<Shape extends z.ZodRawShape>(definition: ToolDefinition<Shape>): RemoteTool {
  const schema = z.object(definition.inputSchema);
  return {
    name: definition.name,
    description: definition.description,
    annotations: definition.annotations,
    inputSchema: definition.inputSchema,
    invoke: async (rawArgs, context) => definition.run(schema.parse(rawArgs ?? {}), context),
  };
}

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;

export function fileResourceUri(remotePath: string): string {
  return `resource://ftp/file?path=${encodeURIComponent(remotePath)}`;
}

function textResult(text: string): CallToolResult {
  return { content: [{ type: 'text', text }] };
}

function jsonResult(payload: unknown): CallToolResult {
  return textResult(JSON.stringify(payload, null, 2));
}

function remoteUri(context: ToolContext, remotePath: string): string {
  const { host, port } = context.service.endpoint;
  return buildRemoteUri(context.protocol, host, port, remotePath);
}

function decodeBase64(data: string): Buffer {
  const compact = data.replace(/\s+/g, '');
  if (compact.length % 4 !== 0 || !BASE64_PATTERN.test(compact)) {
    throw new ToolInputError('dataBase64 is not valid base64');
  }
  return Buffer.from(compact, 'base64');
}

const pathArgument = z.string().describe('Remote path (e.g. /pub/file.txt)');

export const listDirectoryTool = defineTool({
  name: 'ftp_listDirectory',
  description: 'Lists entries in a remote directory. Returns structured JSON describing each item.',
  annotations: { readOnlyHint: true, openWorldHint: true, idempotentHint: true },
  inputSchema: {
    path: z.string().optional().describe("Remote path to list (e.g. /pub). Defaults to the configured root or '/'"),
  },
  run: async (args, context) => {
    const remotePath = context.service.resolvePath(args.path);
    const entries = await context.service.list(remotePath);
    const { host, port } = context.service.endpoint;
    return jsonResult({
      host,
      port,
      protocol: context.protocol,
      path: remotePath,
      items: formatListing(entries),
    });
  },
});

export const downloadFileTool = defineTool({
  name: 'ftp_downloadFile',
  description:
    'Downloads a remote file. Text files are returned decoded with their encoding; anything else is returned as base64.',
  annotations: { readOnlyHint: true, openWorldHint: true, idempotentHint: true },
  inputSchema: { path: pathArgument },
  run: async (args, context) => {
    const remotePath = context.service.resolvePath(args.path);
    const bytes = await context.service.download(remotePath);
    const classification = classifyContent(bytes);
    const contentType = resolveContentType(remotePath, classification.isText);
    const file = formatDownload(remotePath, bytes, classification, contentType);
    const uri = fileResourceUri(remotePath);
    const { host, port } = context.service.endpoint;

    return {
      content: [
        { type: 'text', text: JSON.stringify(file, null, 2) },
        {
          type: 'resource',
          resource:
            classification.isText && classification.decodedText !== undefined
              ? { uri, mimeType: contentType, text: classification.decodedText }
              : { uri, mimeType: contentType, blob: bytes.toString('base64') },
        },
        {
          type: 'resource_link',
          uri,
          name: path.posix.basename(remotePath) || remotePath,
          description: `FTP file ${remotePath} on ${host}:${port}`,
          mimeType: contentType,
          size: bytes.length,
        },
      ],
    };
  },
});

export const uploadFileTool = defineTool({
  name: 'ftp_uploadFile',
  description: 'Uploads base64-encoded data as a file, creating missing parent directories.',
  annotations: { destructiveHint: true, openWorldHint: true, idempotentHint: true },
  inputSchema: {
    path: pathArgument,
    dataBase64: z.string().describe('Base64-encoded file content to upload'),
  },
  run: async (args, context) => {
    const bytes = decodeBase64(args.dataBase64);
    const remotePath = context.service.resolvePath(args.path);
    await context.service.upload(remotePath, bytes);
    return textResult(`Uploaded ${bytes.length} bytes to ${remoteUri(context, remotePath)}`);
  },
});

export const writeFileTool = defineTool({
  name: 'ftp_writeFile',
  description: 'Writes plain text to a remote file using the given encoding (UTF-8 by default).',
  annotations: { destructiveHint: true, openWorldHint: true, idempotentHint: true },
  inputSchema: {
    path: pathArgument,
    content: z.string().describe('Plain text content to write'),
    encoding: z.string().optional().describe('Text encoding: utf-8, utf-16le, iso-8859-1 or ascii. Defaults to utf-8'),
  },
  run: async (args, context) => {
    const { bytes, encodingName } = encodeText(args.content, args.encoding);
    const remotePath = context.service.resolvePath(args.path);
    await context.service.upload(remotePath, bytes);
    return textResult(`Wrote ${bytes.length} bytes to ${remoteUri(context, remotePath)} using ${encodingName} encoding`);
  },
});

export const deleteFileTool = defineTool({
  name: 'ftp_deleteFile',
  description: 'Deletes a remote file.',
  annotations: { destructiveHint: true, openWorldHint: true, idempotentHint: true },
  inputSchema: { path: pathArgument },
  run: async (args, context) => {
    const remotePath = context.service.resolvePath(args.path);
    await context.service.deleteFile(remotePath);
    return textResult(`Deleted ${remoteUri(context, remotePath)}`);
  },
});

export const makeDirectoryTool = defineTool({
  name: 'ftp_makeDirectory',
  description: 'Creates a remote directory, including missing parents.',
  annotations: { destructiveHint: true, openWorldHint: true, idempotentHint: true },
  inputSchema: { path: pathArgument },
  run: async (args, context) => {
    const remotePath = context.service.resolvePath(args.path);
    await context.service.ensureDirectory(remotePath);
    return textResult(`Created directory ${remoteUri(context, remotePath)}`);
  },
});

export const removeDirectoryTool = defineTool({
  name: 'ftp_removeDirectory',
  description: 'Removes a remote directory. The directory must be empty.',
  annotations: { destructiveHint: true, openWorldHint: true, idempotentHint: true },
  inputSchema: { path: pathArgument },
  run: async (args, context) => {
    const remotePath = context.service.resolvePath(args.path);
    await context.service.deleteDirectory(remotePath);
    return textResult(`Removed directory ${remoteUri(context, remotePath)}`);
  },
});

export const renameTool = defineTool({
  name: 'ftp_rename',
  description: 'Renames a remote file or directory within its parent directory.',
  annotations: { destructiveHint: true, openWorldHint: true, idempotentHint: true },
  inputSchema: {
    path: z.string().describe('Current remote path'),
    newName: z.string().min(1).describe('New name (not a full path)'),
  },
  run: async (args, context) => {
    if (/[\\/]/.test(args.newName)) {
      throw new ToolInputError('newName must be a bare name without path separators');
    }
    const remotePath = context.service.resolvePath(args.path);
    const destination = siblingPath(remotePath, args.newName);
    await context.service.rename(remotePath, destination);
    return textResult(`Renamed ${remoteUri(context, remotePath)} to ${args.newName}`);
  },
});

export const getFileSizeTool = defineTool({
  name: 'ftp_getFileSize',
  description: 'Gets the size in bytes of a remote file.',
  annotations: { readOnlyHint: true, openWorldHint: true, idempotentHint: true },
  inputSchema: { path: pathArgument },
  run: async (args, context) => {
    const remotePath = context.service.resolvePath(args.path);
    const size = await context.service.size(remotePath);
    return jsonResult({ path: remotePath, size });
  },
});

export const getModifiedTimeTool = defineTool({
  name: 'ftp_getModifiedTime',
  description: 'Gets the last modified time of a remote file as reported by the server.',
  annotations: { readOnlyHint: true, openWorldHint: true, idempotentHint: true },
  inputSchema: { path: pathArgument },
  run: async (args, context) => {
    const remotePath = context.service.resolvePath(args.path);
    const modified = await context.service.modifiedAt(remotePath);
    return jsonResult({ path: remotePath, modified: modified.toISOString() });
  },
});

export const remoteTools: readonly RemoteTool[] = [
  listDirectoryTool,
  downloadFileTool,
  uploadFileTool,
  writeFileTool,
  deleteFileTool,
  makeDirectoryTool,
  removeDirectoryTool,
  renameTool,
  getFileSizeTool,
  getModifiedTimeTool,
];

export function findTool(name: string): RemoteTool | undefined {
  return remoteTools.find((tool) => tool.name === name);
}
