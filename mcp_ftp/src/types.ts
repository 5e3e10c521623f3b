export type DirectoryEntry = {
  name: string;
  isDirectory: boolean;
  size?: number;
  modifiedAt?: Date;
  permissions?: string;
  rawLine: string;
};

export type ClassificationResult = {
  isText: boolean;
  encodingName: string;
  decodedText?: string;
  confidence: number;
};

export type TransferProtocol = 'ftp' | 'sftp';

export interface RemoteFileClient {
  list(remotePath: string): Promise<DirectoryEntry[]>;
  download(remotePath: string): Promise<Buffer>;
  upload(remotePath: string, contents: Buffer): Promise<void>;
  ensureDirectory(remotePath: string): Promise<void>;
  deleteFile(remotePath: string): Promise<void>;
  deleteDirectory(remotePath: string): Promise<void>;
  rename(fromPath: string, toPath: string): Promise<void>;
  size(remotePath: string): Promise<number>;
  modifiedAt(remotePath: string): Promise<Date>;
  ping(): Promise<void>;
}
