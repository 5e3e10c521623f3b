import path from 'path';
import { Readable, Writable } from 'stream';

import { Client } from 'basic-ftp';

import { parseListing } from './listingParser.js';
import type { DirectoryEntry, RemoteFileClient } from './types.js';

type FtpConfig = {
  host: string;
  port: number;
  user: string;
  password: string;
  secure: boolean;
  ignoreCertErrors: boolean;
  timeoutMs: number;
};

/** One control connection per call; basic-ftp clients cannot run commands concurrently. */
export class FtpClient implements RemoteFileClient {
  constructor(private readonly config: FtpConfig) {}

  private async connect(client: Client): Promise<void> {
    await client.access({
      host: this.config.host,
      port: this.config.port,
      user: this.config.user,
      password: this.config.password,
      secure: this.config.secure,
      secureOptions: { rejectUnauthorized: !this.config.ignoreCertErrors },
    });
    // MLSD replies are fact lists, not listing lines
    client.availableListCommands = ['LIST -a', 'LIST'];
  }

  private async withSession<T>(action: (client: Client) => Promise<T>): Promise<T> {
    const client = new Client(this.config.timeoutMs);
    client.ftp.verbose = false;
    try {
      await this.connect(client);
      return await action(client);
    } finally {
      client.close();
    }
  }

  async ping(): Promise<void> {
    await this.withSession(async (client) => {
      await client.send('NOOP');
    });
  }

  async list(remotePath: string): Promise<DirectoryEntry[]> {
    return this.withSession(async (client) => {
      let rawListing = '';
      // keep the LIST text as sent; the built-in parser rejects unfamiliar formats
      client.parseList = (text: string) => {
        rawListing = text;
        return [];
      };
      await client.list(remotePath);
      return parseListing(rawListing);
    });
  }

  async download(remotePath: string): Promise<Buffer> {
    return this.withSession(async (client) => {
      const chunks: Buffer[] = [];
      const sink = new Writable({
        write(chunk: Buffer, _encoding, callback) {
          chunks.push(chunk);
          callback();
        },
      });
      await client.downloadTo(sink, remotePath);
      return Buffer.concat(chunks);
    });
  }

  async upload(remotePath: string, contents: Buffer): Promise<void> {
    await this.withSession(async (client) => {
      const parent = path.posix.dirname(remotePath);
      if (parent !== '/' && parent !== '.') {
        await client.ensureDir(parent);
      }
      await client.uploadFrom(Readable.from(contents), remotePath);
    });
  }

  async ensureDirectory(remotePath: string): Promise<void> {
    await this.withSession(async (client) => {
      await client.ensureDir(remotePath);
    });
  }

  async deleteFile(remotePath: string): Promise<void> {
    await this.withSession(async (client) => {
      await client.remove(remotePath);
    });
  }

  async deleteDirectory(remotePath: string): Promise<void> {
    await this.withSession(async (client) => {
      await client.removeEmptyDir(remotePath);
    });
  }

  async rename(fromPath: string, toPath: string): Promise<void> {
    await this.withSession(async (client) => {
      await client.rename(fromPath, toPath);
    });
  }

  async size(remotePath: string): Promise<number> {
    return this.withSession((client) => client.size(remotePath));
  }

  async modifiedAt(remotePath: string): Promise<Date> {
    return this.withSession((client) => client.lastMod(remotePath));
  }
}
