import SftpClientLib from 'ssh2-sftp-client';

import { RemoteOperationError } from './errors.js';
import { parseListingLine } from './listingLineParser.js';
import type { DirectoryEntry, RemoteFileClient } from './types.js';

type SftpConfig = {
  host: string;
  port: number;
  username: string;
  password?: string;
  privateKey?: string;
  passphrase?: string;
  timeoutMs: number;
};

export class SftpClient implements RemoteFileClient {
  constructor(private readonly config: SftpConfig) {}

  private async connect(): Promise<SftpClientLib> {
    const client = new SftpClientLib();
    await client.connect({
      host: this.config.host,
      port: this.config.port,
      username: this.config.username,
      password: this.config.password,
      privateKey: this.config.privateKey,
      passphrase: this.config.passphrase,
      readyTimeout: this.config.timeoutMs,
    });
    return client;
  }

  private async withSession<T>(action: (client: SftpClientLib) => Promise<T>): Promise<T> {
    const client = await this.connect();
    try {
      return await action(client);
    } finally {
      await client.end();
    }
  }

  async ping(): Promise<void> {
    await this.withSession(async (client) => {
      await client.cwd();
    });
  }

  async list(remotePath: string): Promise<DirectoryEntry[]> {
    return this.withSession(async (client) => {
      const entries = await client.list(remotePath);
      return entries.map((entry) => {
        // longname is the server's `ls -l` line; the structured fields win where both exist
        const parsed = parseListingLine(entry.longname);
        const listed: DirectoryEntry = {
          name: entry.name,
          isDirectory: entry.type === 'd',
          size: entry.size,
          modifiedAt: new Date(entry.modifyTime),
          rawLine: entry.longname,
        };
        if (parsed.permissions !== undefined) {
          listed.permissions = parsed.permissions;
        }
        return listed;
      });
    });
  }

  async download(remotePath: string): Promise<Buffer> {
    return this.withSession(async (client) => {
      const contents = await client.get(remotePath);
      if (!Buffer.isBuffer(contents)) {
        throw new RemoteOperationError(`Download of '${remotePath}' did not produce a buffer`, remotePath);
      }
      return contents;
    });
  }

  async upload(remotePath: string, contents: Buffer): Promise<void> {
    await this.withSession(async (client) => {
      await client.put(contents, remotePath);
    });
  }

  async ensureDirectory(remotePath: string): Promise<void> {
    await this.withSession(async (client) => {
      await client.mkdir(remotePath, true);
    });
  }

  async deleteFile(remotePath: string): Promise<void> {
    await this.withSession(async (client) => {
      await client.delete(remotePath);
    });
  }

  async deleteDirectory(remotePath: string): Promise<void> {
    await this.withSession(async (client) => {
      await client.rmdir(remotePath, false);
    });
  }

  async rename(fromPath: string, toPath: string): Promise<void> {
    await this.withSession(async (client) => {
      await client.rename(fromPath, toPath);
    });
  }

  async size(remotePath: string): Promise<number> {
    return this.withSession(async (client) => (await client.stat(remotePath)).size);
  }

  async modifiedAt(remotePath: string): Promise<Date> {
    return this.withSession(async (client) => new Date((await client.stat(remotePath)).modifyTime));
  }
}
