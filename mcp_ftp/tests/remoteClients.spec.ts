import { beforeEach, describe, expect, it, vi } from 'vitest';

import { createRemoteClient } from '../src/clientFactory.js';
import { resolveConfig } from '../src/config.js';
import { RemoteOperationError } from '../src/errors.js';
import { FtpClient } from '../src/ftpClient.js';
import { SftpClient } from '../src/sftpClient.js';

const ftpState = vi.hoisted(() => ({
  rawListing: '',
  listCommands: [] as string[],
  accessError: undefined as Error | undefined,
  closed: 0,
}));

const sftpState = vi.hoisted(() => ({
  entries: [] as Array<{ type: string; name: string; size: number; modifyTime: number; longname: string }>,
  getResult: undefined as unknown,
  ended: 0,
}));

vi.mock('basic-ftp', () => ({
  Client: class {
    ftp = { verbose: true };
    parseList: (text: string) => unknown[] = () => [];
    availableListCommands = ['LIST -a', 'LIST'];

    // basic-ftp prefers MLSD once FEAT reports MLST
    async access() {
      if (ftpState.accessError) {
        throw ftpState.accessError;
      }
      this.availableListCommands = ['MLSD', 'LIST -a', 'LIST'];
      return { code: 230, message: 'logged in' };
    }

    async list(remotePath: string) {
      ftpState.listCommands.push(`${this.availableListCommands[0]} ${remotePath}`);
      return this.parseList(ftpState.rawListing);
    }

    close() {
      ftpState.closed += 1;
    }
  },
}));

vi.mock('ssh2-sftp-client', () => ({
  default: class {
    async connect() {
      return {};
    }

    async list() {
      return sftpState.entries;
    }

    async get() {
      return sftpState.getResult;
    }

    async end() {
      sftpState.ended += 1;
      return true;
    }
  },
}));

const ftpConfig = {
  host: 'ftp.example.test',
  port: 21,
  user: 'anonymous',
  password: '',
  secure: false,
  ignoreCertErrors: false,
  timeoutMs: 1000,
};

const sftpConfig = {
  host: 'sftp.example.test',
  port: 22,
  username: 'deploy',
  password: 'test-secret',
  timeoutMs: 1000,
};

describe('FtpClient', () => {
  beforeEach(() => {
    ftpState.listCommands = [];
    ftpState.accessError = undefined;
    ftpState.closed = 0;
  });

  it('parses the raw LIST text itself and closes the session', async () => {
    ftpState.rawListing = '-rw-r--r-- 1 ftp ftp 1234 Jan 20 2023 my file.txt\r\n01-10-23  02:14PM  <DIR>  archive\r\n';

    const entries = await new FtpClient(ftpConfig).list('/pub');

    expect(ftpState.listCommands).toEqual(['LIST -a /pub']);
    expect(ftpState.closed).toBe(1);
    expect(entries.map((entry) => [entry.name, entry.isDirectory])).toEqual([
      ['my file.txt', false],
      ['archive', true],
    ]);
  });

  it('closes the connection when login fails', async () => {
    ftpState.accessError = new Error('530 Login incorrect.');

    await expect(new FtpClient(ftpConfig).list('/pub')).rejects.toThrow('530 Login incorrect.');
    expect(ftpState.closed).toBe(1);
    expect(ftpState.listCommands).toEqual([]);
  });
});

describe('SftpClient', () => {
  beforeEach(() => {
    sftpState.ended = 0;
  });

  it('takes structured fields from the server and permissions from the long name', async () => {
    sftpState.entries = [
      {
        type: 'd',
        name: 'incoming',
        size: 4096,
        modifyTime: Date.UTC(2026, 0, 10, 10, 0, 0),
        longname: 'drwxr-xr-x    2 ftp      ftp          4096 Jan 10 10:00 incoming',
      },
      {
        type: '-',
        name: 'report.csv',
        size: 10,
        modifyTime: Date.UTC(2024, 2, 3),
        longname: 'report.csv',
      },
    ];

    const entries = await new SftpClient(sftpConfig).list('/home/deploy');

    expect(entries).toEqual([
      {
        name: 'incoming',
        isDirectory: true,
        size: 4096,
        modifiedAt: new Date(Date.UTC(2026, 0, 10, 10, 0, 0)),
        permissions: 'drwxr-xr-x',
        rawLine: 'drwxr-xr-x    2 ftp      ftp          4096 Jan 10 10:00 incoming',
      },
      {
        name: 'report.csv',
        isDirectory: false,
        size: 10,
        modifiedAt: new Date(Date.UTC(2024, 2, 3)),
        rawLine: 'report.csv',
      },
    ]);
    expect(sftpState.ended).toBe(1);
  });

  it('rejects a download that is not a buffer', async () => {
    sftpState.getResult = 'not a buffer';

    await expect(new SftpClient(sftpConfig).download('/home/deploy/a.txt')).rejects.toBeInstanceOf(
      RemoteOperationError,
    );
    expect(sftpState.ended).toBe(1);
  });
});

describe('createRemoteClient', () => {
  it('picks the client for the configured protocol', () => {
    expect(createRemoteClient(resolveConfig({}))).toBeInstanceOf(FtpClient);
    expect(createRemoteClient(resolveConfig({ FTP_PROTOCOL: 'sftp' }))).toBeInstanceOf(SftpClient);
  });
});
