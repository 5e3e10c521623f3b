import { FtpClient } from './ftpClient.js';
import { SftpClient } from './sftpClient.js';
import type { ServiceConfig } from './config.js';
import type { RemoteFileClient } from './types.js';

export function createRemoteClient(config: ServiceConfig): RemoteFileClient {
  if (config.protocol === 'sftp') {
    return new SftpClient({
      host: config.sftpHost,
      port: config.sftpPort,
      username: config.sftpUsername,
      password: config.sftpPassword,
      privateKey: config.sftpPrivateKey,
      passphrase: config.sftpPassphrase,
      timeoutMs: config.timeoutMs,
    });
  }

  return new FtpClient({
    host: config.ftpHost,
    port: config.ftpPort,
    user: config.ftpUser,
    password: config.ftpPassword,
    secure: config.ftpSecure,
    ignoreCertErrors: config.ignoreCertErrors,
    timeoutMs: config.timeoutMs,
  });
}
