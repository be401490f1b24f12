/**
 * Storage Module
 *
 * Responsibilities:
 * - Implement S3StorageAdapter using AWS SDK v3
 * - Implement MemoryStorageAdapter for testing
 * - Handle artifact CRUD operations
 * - Manage metadata and checksums
 *
 * Storage paths:
 * - tasks/{task_id}/discovery.json
 * - tasks/{task_id}/extraction.json
 * - tasks/{task_id}/dataset.json
 * - tasks/{task_id}/task.json
 */

import {
  S3Client,
  PutObjectCommand,
  GetObjectCommand,
  HeadObjectCommand,
  DeleteObjectCommand,
  ListObjectsV2Command,
  type S3ClientConfig,
} from '@aws-sdk/client-s3';
import { createHash } from 'crypto';
import type { StorageAdapter, ArtifactMetadata, ArtifactType, TaskId } from '../types/index.js';

export type { StorageAdapter, ArtifactType };

/**
 * Map artifact type to file name
 */
const ARTIFACT_FILE_NAMES: Record<ArtifactType, string> = {
  discovery: 'discovery.json',
  extraction: 'extraction.json',
  dataset: 'dataset.json',
  task: 'task.json',
};

function isArtifactType(value: string): value is ArtifactType {
  return Object.prototype.hasOwnProperty.call(ARTIFACT_FILE_NAMES, value);
}

/**
 * File name used for an artifact type; unknown types get `<type>.json`
 */
export function artifactFileName(artifactType: string): string {
  return isArtifactType(artifactType) ? ARTIFACT_FILE_NAMES[artifactType] : `${artifactType}.json`;
}

/**
 * S3 configuration for storage adapter
 */
export interface S3Config {
  /** S3 bucket name */
  bucket: string;
  /** AWS region (defaults to us-east-1) */
  region?: string;
  /** Key prefix for all objects (defaults to 'tasks') */
  prefix?: string;
  /** Custom S3 endpoint for local development or S3-compatible services */
  endpoint?: string;
  /** AWS credentials (optional if using IAM roles or environment variables) */
  credentials?: {
    accessKeyId: string;
    secretAccessKey: string;
  };
  /** Force path style for S3-compatible services like MinIO */
  forcePathStyle?: boolean;
}

/**
 * Calculate MD5 checksum for content
 */
function calculateChecksum(content: string | Buffer): string {
  const buffer = typeof content === 'string' ? Buffer.from(content, 'utf-8') : content;
  return createHash('md5').update(buffer).digest('hex');
}

/**
 * Get content size in bytes
 */
function getContentSize(content: string | Buffer): number {
  return typeof content === 'string' ? Buffer.byteLength(content, 'utf-8') : content.length;
}

function resolveContentType(metadata?: Record<string, string>): string {
  return metadata?.contentType ?? 'application/json';
}

/**
 * S3 implementation of StorageAdapter using AWS SDK v3
 */
export class S3StorageAdapter implements StorageAdapter {
  private client: S3Client;
  private bucket: string;
  private prefix: string;

  /**
   * @param config - S3 configuration options
   * @param client - Optional preconfigured client
   */
  constructor(config: S3Config, client?: S3Client) {
    this.bucket = config.bucket;
    this.prefix = config.prefix ?? 'tasks';

    if (client) {
      this.client = client;
      return;
    }

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

  /**
   * Generate S3 key for artifact
   */
  private getKey(taskId: TaskId, artifactType: string): string {
    return `${this.prefix}/${taskId}/${artifactFileName(artifactType)}`;
  }

  /**
   * Parse artifact type from S3 key
   */
  private parseArtifactType(key: string): string {
    const fileName = key.split('/').pop() ?? '';
    for (const [type, name] of Object.entries(ARTIFACT_FILE_NAMES)) {
      if (name === fileName) {
        return type;
      }
    }
    return fileName.replace('.json', '');
  }

  async save(
    taskId: TaskId,
    artifactType: string,
    content: string | Buffer,
    metadata?: Record<string, string>
  ): Promise<ArtifactMetadata> {
    const key = this.getKey(taskId, artifactType);
    const now = new Date().toISOString();
    const checksum = calculateChecksum(content);
    const size = getContentSize(content);
    const contentType = resolveContentType(metadata);

    const s3Metadata: Record<string, string> = {
      'task-id': taskId,
      'artifact-type': artifactType,
      'created-at': now,
      checksum,
    };

    if (metadata) {
      for (const [k, v] of Object.entries(metadata)) {
        if (k !== 'contentType') {
          s3Metadata[k] = v;
        }
      }
    }

    await this.client.send(
      new PutObjectCommand({
        Bucket: this.bucket,
        Key: key,
        Body: content,
        ContentType: contentType,
        Metadata: s3Metadata,
      })
    );

    return {
      taskId,
      artifactType,
      fileName: artifactFileName(artifactType),
      createdAt: now,
      contentType,
      size,
      checksum,
    };
  }

  /**
   * @throws Error if artifact not found
   */
  async load(
    taskId: TaskId,
    artifactType: string
  ): Promise<{ content: string | Buffer; metadata: ArtifactMetadata }> {
    const response = await this.client.send(
      new GetObjectCommand({
        Bucket: this.bucket,
        Key: this.getKey(taskId, artifactType),
      })
    );

    if (!response.Body) {
      throw new Error(`Artifact not found: ${taskId}/${artifactType}`);
    }

    const content = await response.Body.transformToString();

    const metadata: ArtifactMetadata = {
      taskId,
      artifactType,
      fileName: artifactFileName(artifactType),
      createdAt: response.Metadata?.['created-at'] ?? new Date().toISOString(),
      contentType: response.ContentType ?? 'application/json',
    };

    if (response.ContentLength !== undefined) {
      metadata.size = response.ContentLength;
    }

    if (response.Metadata?.checksum) {
      metadata.checksum = response.Metadata.checksum;
    }

    return { content, metadata };
  }

  async exists(taskId: TaskId, artifactType: string): Promise<boolean> {
    try {
      await this.client.send(
        new HeadObjectCommand({
          Bucket: this.bucket,
          Key: this.getKey(taskId, artifactType),
        })
      );
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

  async list(taskId: TaskId): Promise<ArtifactMetadata[]> {
    const response = await this.client.send(
      new ListObjectsV2Command({
        Bucket: this.bucket,
        Prefix: `${this.prefix}/${taskId}/`,
      })
    );

    if (!response.Contents) {
      return [];
    }

    return response.Contents.map((obj) => {
      const metadata: ArtifactMetadata = {
        taskId,
        artifactType: this.parseArtifactType(obj.Key ?? ''),
        fileName: obj.Key?.split('/').pop() ?? '',
        createdAt: obj.LastModified?.toISOString() ?? new Date().toISOString(),
        contentType: 'application/json',
      };
      if (obj.Size !== undefined) {
        metadata.size = obj.Size;
      }
      return metadata;
    });
  }

  /**
   * Delete one artifact, or every artifact of the task when no type is given
   */
  async delete(taskId: TaskId, artifactType?: string): Promise<void> {
    const types = artifactType
      ? [artifactType]
      : (await this.list(taskId)).map((artifact) => artifact.artifactType);

    for (const type of types) {
      await this.client.send(
        new DeleteObjectCommand({
          Bucket: this.bucket,
          Key: this.getKey(taskId, type),
        })
      );
    }
  }
}

/**
 * In-memory storage adapter for testing and development
 */
export class MemoryStorageAdapter implements StorageAdapter {
  private store: Map<string, { content: string | Buffer; metadata: ArtifactMetadata }> = new Map();

  private getKey(taskId: TaskId, artifactType: string): string {
    return `${taskId}/${artifactType}`;
  }

  async save(
    taskId: TaskId,
    artifactType: string,
    content: string | Buffer,
    metadata?: Record<string, string>
  ): Promise<ArtifactMetadata> {
    const artifactMetadata: ArtifactMetadata = {
      taskId,
      artifactType,
      fileName: artifactFileName(artifactType),
      createdAt: new Date().toISOString(),
      contentType: resolveContentType(metadata),
      size: getContentSize(content),
      checksum: calculateChecksum(content),
    };

    this.store.set(this.getKey(taskId, artifactType), { content, metadata: artifactMetadata });

    return artifactMetadata;
  }

  async load(
    taskId: TaskId,
    artifactType: string
  ): Promise<{ content: string | Buffer; metadata: ArtifactMetadata }> {
    const item = this.store.get(this.getKey(taskId, artifactType));

    if (!item) {
      throw new Error(`Artifact not found: ${taskId}/${artifactType}`);
    }

    return item;
  }

  async exists(taskId: TaskId, artifactType: string): Promise<boolean> {
    return this.store.has(this.getKey(taskId, artifactType));
  }

  async list(taskId: TaskId): Promise<ArtifactMetadata[]> {
    const prefix = `${taskId}/`;
    const artifacts: ArtifactMetadata[] = [];

    for (const [key, value] of this.store.entries()) {
      if (key.startsWith(prefix)) {
        artifacts.push(value.metadata);
      }
    }

    return artifacts;
  }

  async delete(taskId: TaskId, artifactType?: string): Promise<void> {
    if (artifactType) {
      this.store.delete(this.getKey(taskId, artifactType));
      return;
    }
    const prefix = `${taskId}/`;
    for (const key of Array.from(this.store.keys())) {
      if (key.startsWith(prefix)) {
        this.store.delete(key);
      }
    }
  }

  /**
   * Clear all stored artifacts (useful for test cleanup)
   */
  clear(): void {
    this.store.clear();
  }

  /**
   * Number of stored artifacts
   */
  size(): number {
    return this.store.size;
  }
}

/**
 * Factory function to create the storage adapter for a configuration
 */
export function createStorageAdapter(config: S3Config | { type: 'memory' }): StorageAdapter {
  if ('type' in config) {
    return new MemoryStorageAdapter();
  }
  return new S3StorageAdapter(config);
}
