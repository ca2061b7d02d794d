/**
 * Artifact storage on an S3-compatible bucket through the MinIO client.
 */

import { Client } from 'minio';
import { config, parseEndpoint } from '../config/index.js';
import { logger } from '../infra/logger.js';
import { StorageError, getErrorMessage } from '../infra/errors.js';

export interface ArtifactStore {
    /** Create the bucket when it does not exist yet. */
    ensureBucket(): Promise<void>;
    /** Store an object and return its public URL. */
    upload(objectName: string, data: Buffer, contentType: string): Promise<string>;
}

export interface StorageSettings {
    endpoint: string;
    accessKey: string;
    secretKey: string;
    bucket: string;
    secure: boolean;
    publicEndpoint: string;
}

export type BucketClient = Pick<Client, 'bucketExists' | 'makeBucket' | 'putObject'>;

export function createMinioClient(settings: StorageSettings): Client {
    const { host, port } = parseEndpoint(settings.endpoint);
    return new Client({
        endPoint: host,
        port,
        useSSL: settings.secure,
        accessKey: settings.accessKey,
        secretKey: settings.secretKey,
    });
}

export class MinioStore implements ArtifactStore {
    private readonly client: BucketClient;

    constructor(
        private readonly settings: StorageSettings = config.storage,
        client?: BucketClient,
    ) {
        this.client = client ?? createMinioClient(settings);
    }

    get bucket(): string {
        return this.settings.bucket;
    }

    async ensureBucket(): Promise<void> {
        try {
            if (await this.client.bucketExists(this.settings.bucket)) return;
            await this.client.makeBucket(this.settings.bucket);
            logger.info(`Created bucket: ${this.settings.bucket}`, 'Storage');
        } catch (error) {
            throw new StorageError(`Bucket "${this.settings.bucket}" is unavailable: ${getErrorMessage(error)}`, { cause: error });
        }
    }

    async upload(objectName: string, data: Buffer, contentType: string): Promise<string> {
        try {
            await this.client.putObject(this.settings.bucket, objectName, data, data.length, {
                'Content-Type': contentType,
            });
        } catch (error) {
            logger.error(`Error uploading ${objectName}`, 'Storage', error);
            throw new StorageError(`Failed to upload file: ${getErrorMessage(error)}`, { cause: error });
        }
        return this.publicUrl(objectName);
    }

    publicUrl(objectName: string): string {
        const base = this.settings.publicEndpoint.replace(/\/+$/, '');
        return `${base}/${this.settings.bucket}/${objectName}`;
    }
}
