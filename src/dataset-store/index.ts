/**
 * Dataset Store Module
 *
 * Responsibilities:
 * - Define the DatasetStore interface for the preprocessed dataset snapshot
 * - Implement S3DatasetStore using AWS SDK v3
 * - Implement MemoryDatasetStore for tests and local sessions
 * - Report size, checksum and dataset version of saved snapshots
 *
 * The session hashes the bytes returned by load() into the dataset version,
 * so a snapshot saved and reloaded yields the same cache keys.
 *
 * Usage:
 * const store = createDatasetStore({ type: 's3', bucket: 'transit-data', key: 'subways/latest.csv' });
 * if (await store.exists()) {
 *   await session.loadDatasetFromStore(store);
 * }
 */

import {
  S3Client,
  PutObjectCommand,
  GetObjectCommand,
  HeadObjectCommand,
  type S3ClientConfig,
} from '@aws-sdk/client-s3';
import { createHash } from 'crypto';
import { computeDatasetVersion } from '../cache/index.js';
import type { DatasetVersion } from '../types/index.js';

export const DEFAULT_DATASET_CONTENT_TYPE = 'text/csv';

/**
 * Metadata about a stored snapshot
 */
export interface DatasetSnapshotMetadata {
  location: string;
  contentType: string;
  size: number;
  /** MD5 of the bytes, as stored alongside the object */
  checksum: string;
  datasetVersion: DatasetVersion;
  savedAt: string;
}

export interface DatasetStore {
  /** Human-readable location, used in logs */
  describe(): string;
  exists(): Promise<boolean>;
  load(): Promise<Buffer>;
  save(content: string | Buffer, contentType?: string): Promise<DatasetSnapshotMetadata>;
}

/**
 * S3 configuration for the dataset store
 */
export interface S3DatasetConfig {
  /** S3 bucket name */
  bucket: string;
  /** Object key of the snapshot */
  key: string;
  /** AWS region (defaults to us-east-1) */
  region?: string;
  /** Custom S3 endpoint for local development or alternative S3-compatible services */
  endpoint?: string;
  /** AWS credentials (optional if using IAM roles or environment variables) */
  credentials?: {
    accessKeyId: string;
    secretAccessKey: string;
  };
  /** Force path style for S3-compatible services like MinIO */
  forcePathStyle?: boolean;
}

export type DatasetStoreConfig = ({ type: 's3' } & S3DatasetConfig) | { type: 'memory' };

function toBuffer(content: string | Buffer): Buffer {
  return typeof content === 'string' ? Buffer.from(content, 'utf-8') : content;
}

function calculateChecksum(content: Buffer): string {
  return createHash('md5').update(content).digest('hex');
}

function describeSnapshot(location: string, content: Buffer, contentType: string): DatasetSnapshotMetadata {
  return {
    location,
    contentType,
    size: content.length,
    checksum: calculateChecksum(content),
    datasetVersion: computeDatasetVersion(content),
    savedAt: new Date().toISOString(),
  };
}

/**
 * S3-backed snapshot store
 */
export class S3DatasetStore implements DatasetStore {
  private readonly client: S3Client;
  private readonly bucket: string;
  private readonly key: string;

  constructor(config: S3DatasetConfig) {
    this.bucket = config.bucket;
    this.key = config.key;

    const clientConfig: S3ClientConfig = {
      region: config.region ?? 'us-east-1',
    };

    if (config.endpoint) {
      clientConfig.endpoint = config.endpoint;
    }

    if (config.credentials) {
      clientConfig.credentials = config.credentials;
    }

    if (config.forcePathStyle) {
      clientConfig.forcePathStyle = true;
    }

    this.client = new S3Client(clientConfig);
  }

  describe(): string {
    return `s3://${this.bucket}/${this.key}`;
  }

  async exists(): Promise<boolean> {
    try {
      await this.client.send(new HeadObjectCommand({ Bucket: this.bucket, Key: this.key }));
      return true;
    } catch (error: unknown) {
      if (
        error instanceof Error &&
        (error.name === 'NotFound' ||
          error.name === 'NoSuchKey' ||
          error.message.includes('404') ||
          error.message.includes('Not Found'))
      ) {
        return false;
      }
      throw error;
    }
  }

  /**
   * @throws Error if the snapshot does not exist
   */
  async load(): Promise<Buffer> {
    const response = await this.client.send(new GetObjectCommand({ Bucket: this.bucket, Key: this.key }));

    if (!response.Body) {
      throw new Error(`Dataset snapshot not found: ${this.describe()}`);
    }

    return Buffer.from(await response.Body.transformToByteArray());
  }

  async save(content: string | Buffer, contentType = DEFAULT_DATASET_CONTENT_TYPE): Promise<DatasetSnapshotMetadata> {
    const body = toBuffer(content);
    const metadata = describeSnapshot(this.describe(), body, contentType);

    await this.client.send(
      new PutObjectCommand({
        Bucket: this.bucket,
        Key: this.key,
        Body: body,
        ContentType: contentType,
        Metadata: {
          checksum: metadata.checksum,
          'dataset-version': metadata.datasetVersion,
          'saved-at': metadata.savedAt,
        },
      })
    );

    return metadata;
  }
}

/**
 * In-memory snapshot store
 */
export class MemoryDatasetStore implements DatasetStore {
  private content: Buffer | null = null;

  constructor(private readonly name = 'memory://dataset') {}

  describe(): string {
    return this.name;
  }

  async exists(): Promise<boolean> {
    return this.content !== null;
  }

  async load(): Promise<Buffer> {
    if (!this.content) {
      throw new Error(`Dataset snapshot not found: ${this.describe()}`);
    }
    return Buffer.from(this.content);
  }

  async save(content: string | Buffer, contentType = DEFAULT_DATASET_CONTENT_TYPE): Promise<DatasetSnapshotMetadata> {
    this.content = Buffer.from(toBuffer(content));
    return describeSnapshot(this.describe(), this.content, contentType);
  }

  clear(): void {
    this.content = null;
  }
}

/**
 * Create a dataset store from configuration
 */
export function createDatasetStore(config: DatasetStoreConfig): DatasetStore {
  switch (config.type) {
    case 's3':
      return new S3DatasetStore(config);
    case 'memory':
      return new MemoryDatasetStore();
  }
}
