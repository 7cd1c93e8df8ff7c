import fs from 'fs/promises';
import path from 'path';
import crypto from 'crypto';
import { S3Client, PutObjectCommand, HeadObjectCommand, DeleteObjectCommand, S3ServiceException } from '@aws-sdk/client-s3';
import { config, type AppConfig } from '../config/env';

export type UploadFolder = 'company_logos' | 'object_images' | 'floorplans';

export interface FileStorage {
  /** Stores `body` and returns the name it was stored under, which may differ from `name`. */
  save(name: string, body: Buffer, contentType: string): Promise<string>;
  exists(name: string): Promise<boolean>;
  url(name: string): string;
  delete(name: string): Promise<void>;
}

const RANDOM_ALPHABET = 'abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789';

const randomSuffix = (length = 7) => {
  const bytes = crypto.randomBytes(length);
  return Array.from(bytes, byte => RANDOM_ALPHABET[byte % RANDOM_ALPHABET.length]).join('');
};

export const sanitizeFileName = (fileName: string) => {
  const base = path.basename(fileName.replace(/\\/g, '/'));
  const cleaned = base.replace(/\s+/g, '_').replace(/[^A-Za-z0-9._-]/g, '').replace(/^\.+/, '');
  return cleaned.length > 0 ? cleaned : 'file';
};

export const buildStorageName = (folder: UploadFolder, fileName: string) => `${folder}/${sanitizeFileName(fileName)}`;

/**
 * Returns `name` if free, otherwise `name` with a random suffix before the
 * extension. Existing files are never overwritten.
 */
export const getAvailableName = async (storage: Pick<FileStorage, 'exists'>, name: string) => {
  const dir = path.posix.dirname(name);
  const ext = path.posix.extname(name);
  const stem = path.posix.basename(name, ext);

  let candidate = name;
  while (await storage.exists(candidate)) {
    candidate = path.posix.join(dir, `${stem}_${randomSuffix()}${ext}`);
  }
  return candidate;
};

export class LocalFileStorage implements FileStorage {
  constructor(private readonly root: string, private readonly baseUrl: string) {}

  private resolve(name: string) {
    const target = path.resolve(this.root, name);
    if (!target.startsWith(path.resolve(this.root) + path.sep)) {
      throw new Error(`Refusing to access ${name} outside media root`);
    }
    return target;
  }

  async save(name: string, body: Buffer, _contentType: string) {
    const available = await getAvailableName(this, name);
    const target = this.resolve(available);
    await fs.mkdir(path.dirname(target), { recursive: true });
    // 'wx' fails if another writer claimed the name in the meantime
    await fs.writeFile(target, body, { flag: 'wx' });
    return available;
  }

  async exists(name: string) {
    try {
      await fs.access(this.resolve(name));
      return true;
    } catch (error) {
      if (typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT') return false;
      throw error;
    }
  }

  url(name: string) {
    return `${this.baseUrl}${name.split('/').map(encodeURIComponent).join('/')}`;
  }

  async delete(name: string) {
    await fs.rm(this.resolve(name), { force: true });
  }
}

export interface S3StorageOptions {
  bucket: string;
  endpoint: string;
}

export class S3FileStorage implements FileStorage {
  constructor(private readonly client: S3Client, private readonly options: S3StorageOptions) {}

  async save(name: string, body: Buffer, contentType: string) {
    const available = await getAvailableName(this, name);
    await this.client.send(new PutObjectCommand({
      Bucket: this.options.bucket,
      Key: available,
      Body: body,
      ContentType: contentType,
      ACL: 'public-read',
      CacheControl: 'max-age=86400',
    }));
    return available;
  }

  async exists(name: string) {
    try {
      await this.client.send(new HeadObjectCommand({ Bucket: this.options.bucket, Key: name }));
      return true;
    } catch (error) {
      if (error instanceof S3ServiceException && error.$metadata.httpStatusCode === 404) return false;
      throw error;
    }
  }

  // Public objects: plain URL, no signature in the query string.
  url(name: string) {
    return `${this.options.endpoint}/${this.options.bucket}/${name.split('/').map(encodeURIComponent).join('/')}`;
  }

  async delete(name: string) {
    await this.client.send(new DeleteObjectCommand({ Bucket: this.options.bucket, Key: name }));
  }
}

export const createStorage = (appConfig: AppConfig): FileStorage => {
  if (appConfig.storage.backend === 's3') {
    const client = new S3Client({
      region: appConfig.storage.region,
      endpoint: appConfig.storage.endpoint || undefined,
      forcePathStyle: true,
      credentials: {
        accessKeyId: appConfig.storage.accessKeyId,
        secretAccessKey: appConfig.storage.secretAccessKey,
      },
    });
    return new S3FileStorage(client, { bucket: appConfig.storage.bucket, endpoint: appConfig.storage.endpoint });
  }

  return new LocalFileStorage(appConfig.media.root, appConfig.media.url);
};

export const storage = createStorage(config);

export const fileUrl = (name: string | null) => (name ? storage.url(name) : null);
