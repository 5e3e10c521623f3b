import fs from 'fs';
import process from 'process';

import { z } from 'zod';

import type { TransferProtocol } from './types.js';

type Environment = Record<string, string | undefined>;

const booleanField = z.union([z.string(), z.boolean(), z.undefined()]).transform((value: string | boolean | undefined): boolean => {
  if (typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase();
    if (['1', 'true', 'yes', 'on'].includes(normalized)) {
      return true;
    }
    if (['0', 'false', 'no', 'off', ''].includes(normalized)) {
      return false;
    }
  }
  return false;
});

const intField = (fallback: number) =>
  z.union([z.string(), z.number(), z.undefined()]).transform((value: string | number | undefined): number => {
    if (typeof value === 'number' && Number.isFinite(value)) {
      return value;
    }
    if (typeof value === 'string' && value.trim()) {
      const parsed = Number.parseInt(value, 10);
      if (Number.isFinite(parsed) && parsed > 0) {
        return parsed;
      }
    }
    return fallback;
  });

const stringField = (fallback: string) =>
  z.union([z.string(), z.undefined()]).transform((value: string | undefined): string => {
    if (typeof value === 'string') {
      const trimmed = value.trim();
      if (trimmed.length > 0) {
        return trimmed;
      }
    }
    return fallback;
  });

const optionalString = z.union([z.string(), z.undefined()]).transform((value: string | undefined) => {
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : undefined;
  }
  return undefined;
});

const configSchema = z.object({
  FTP_HOST: stringField('localhost'),
  FTP_PORT: intField(21),
  FTP_USER: stringField('anonymous'),
  FTP_PASSWORD: stringField(''),
  FTP_SECURE: booleanField,
  FTP_IGNORE_CERT_ERRORS: booleanField,
  FTP_PROTOCOL: stringField('ftp').transform((value): TransferProtocol => (value.toLowerCase() === 'sftp' ? 'sftp' : 'ftp')),
  SFTP_HOST: optionalString,
  SFTP_PORT: intField(22),
  SFTP_USERNAME: optionalString,
  SFTP_PASSWORD: optionalString,
  SFTP_PRIVATE_KEY: optionalString,
  SFTP_PRIVATE_KEY_PATH: optionalString,
  SFTP_PASSPHRASE: optionalString,
  FTP_ROOT: stringField('/'),
  FTP_TIMEOUT_MS: intField(10000),
  HOST: stringField('0.0.0.0'),
  PORT: intField(8007),
  LOG_LEVEL: stringField('info'),
});

export type ServiceConfig = {
  protocol: TransferProtocol;
  ftpHost: string;
  ftpPort: number;
  ftpUser: string;
  ftpPassword: string;
  ftpSecure: boolean;
  ignoreCertErrors: boolean;
  sftpHost: string;
  sftpPort: number;
  sftpUsername: string;
  sftpPassword?: string;
  sftpPrivateKey?: string;
  sftpPassphrase?: string;
  defaultPath: string;
  timeoutMs: number;
  listenHost: string;
  listenPort: number;
  logLevel: string;
};

function loadPrivateKey(pathOrValue?: string): string | undefined {
  if (!pathOrValue) {
    return undefined;
  }
  // anything that is not an existing file is taken as literal key content
  if (fs.existsSync(pathOrValue)) {
    return fs.readFileSync(pathOrValue, 'utf8');
  }
  return pathOrValue;
}

export function resolveConfig(env: Environment = process.env): ServiceConfig {
  const raw = configSchema.parse(env);
  return {
    protocol: raw.FTP_PROTOCOL,
    ftpHost: raw.FTP_HOST,
    ftpPort: raw.FTP_PORT,
    ftpUser: raw.FTP_USER,
    ftpPassword: raw.FTP_PASSWORD,
    ftpSecure: raw.FTP_SECURE,
    ignoreCertErrors: raw.FTP_IGNORE_CERT_ERRORS,
    sftpHost: raw.SFTP_HOST ?? raw.FTP_HOST,
    sftpPort: raw.SFTP_PORT,
    sftpUsername: raw.SFTP_USERNAME ?? raw.FTP_USER,
    sftpPassword: raw.SFTP_PASSWORD ?? (raw.FTP_PASSWORD || undefined),
    sftpPrivateKey: loadPrivateKey(raw.SFTP_PRIVATE_KEY ?? raw.SFTP_PRIVATE_KEY_PATH),
    sftpPassphrase: raw.SFTP_PASSPHRASE,
    defaultPath: raw.FTP_ROOT,
    timeoutMs: raw.FTP_TIMEOUT_MS,
    listenHost: raw.HOST,
    listenPort: raw.PORT,
    logLevel: raw.LOG_LEVEL,
  };
}

/** Host and port of whichever protocol is active. */
export function activeEndpoint(config: ServiceConfig): { host: string; port: number } {
  return config.protocol === 'sftp'
    ? { host: config.sftpHost, port: config.sftpPort }
    : { host: config.ftpHost, port: config.ftpPort };
}
