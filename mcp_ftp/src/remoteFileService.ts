import { activeEndpoint, type ServiceConfig } from './config.js';
import type { Logger } from './logger.js';
import { normalizeRemotePath } from './paths.js';
import type { DirectoryEntry, RemoteFileClient } from './types.js';

/**
 * Logs every remote call and its outcome around a {@link RemoteFileClient}.
 * Paths handed to the operations are expected to be resolved already.
 */
export class RemoteFileService {
  private readonly log: Logger;

  constructor(
    private readonly client: RemoteFileClient,
    private readonly config: ServiceConfig,
    logger: Logger,
  ) {
    this.log = logger.child({ module: 'remote-file-service', protocol: config.protocol });
  }

  get endpoint(): { host: string; port: number } {
    return activeEndpoint(this.config);
  }

  resolvePath(rawPath?: string): string {
    return normalizeRemotePath(rawPath, this.config.defaultPath);
  }

  async list(remotePath: string): Promise<DirectoryEntry[]> {
    return this.execute('list', remotePath, async () => {
      const entries = await this.client.list(remotePath);
      this.log.info({ path: remotePath, count: entries.length }, 'Listed remote directory');
      return entries;
    });
  }

  async download(remotePath: string): Promise<Buffer> {
    return this.execute('download', remotePath, async () => {
      const bytes = await this.client.download(remotePath);
      this.log.info({ path: remotePath, bytes: bytes.length }, 'Downloaded remote file');
      return bytes;
    });
  }

  async upload(remotePath: string, contents: Buffer): Promise<void> {
    await this.execute('upload', remotePath, async () => {
      await this.client.upload(remotePath, contents);
      this.log.info({ path: remotePath, bytes: contents.length }, 'Uploaded remote file');
    });
  }

  async ensureDirectory(remotePath: string): Promise<void> {
    await this.execute('ensureDirectory', remotePath, async () => {
      await this.client.ensureDirectory(remotePath);
      this.log.info({ path: remotePath }, 'Created remote directory');
    });
  }

  async deleteFile(remotePath: string): Promise<void> {
    await this.execute('deleteFile', remotePath, async () => {
      await this.client.deleteFile(remotePath);
      this.log.info({ path: remotePath }, 'Deleted remote file');
    });
  }

  async deleteDirectory(remotePath: string): Promise<void> {
    await this.execute('deleteDirectory', remotePath, async () => {
      await this.client.deleteDirectory(remotePath);
      this.log.info({ path: remotePath }, 'Removed remote directory');
    });
  }

  async rename(fromPath: string, toPath: string): Promise<void> {
    await this.execute('rename', fromPath, async () => {
      await this.client.rename(fromPath, toPath);
      this.log.info({ path: fromPath, destination: toPath }, 'Renamed remote path');
    });
  }

  async size(remotePath: string): Promise<number> {
    return this.execute('size', remotePath, () => this.client.size(remotePath));
  }

  async modifiedAt(remotePath: string): Promise<Date> {
    return this.execute('modifiedAt', remotePath, () => this.client.modifiedAt(remotePath));
  }

  async ping(): Promise<void> {
    await this.execute('ping', '/', () => this.client.ping());
  }

  private async execute<T>(operation: string, remotePath: string, action: () => Promise<T>): Promise<T> {
    const { host, port } = this.endpoint;
    this.log.debug({ operation, path: remotePath, host, port }, 'Starting remote operation');
    try {
      return await action();
    } catch (error) {
      this.log.error({ err: error, operation, path: remotePath, host, port }, 'Remote operation failed');
      throw error;
    }
  }
}
