/**
 * Storage seam used by the upload and poll services.
 * Production wires S3ObjectStore; tests use the in-memory fake.
 */

export interface PresignedUpload {
    url: string;
    /** Form fields to send before the file part, in this order. */
    fields: Record<string, string>;
}

export interface PresignOptions {
    expiresInSeconds: number;
    maxBytes: number;
    contentType: string;
}

export interface ObjectInfo {
    key: string;
    size?: number;
    contentType?: string;
    lastModified?: Date;
}

export interface StoredObject extends ObjectInfo {
    body: Uint8Array;
}

export interface ObjectStore {
    readonly bucket: string;

    createPresignedPost(key: string, options: PresignOptions): Promise<PresignedUpload>;

    /** Resolves null when the key does not exist; throws on any other failure. */
    headObject(key: string): Promise<ObjectInfo | null>;

    /** Resolves null when the key does not exist; throws on any other failure. */
    getObject(key: string): Promise<StoredObject | null>;

    getSignedDownloadUrl(key: string, expiresInSeconds: number): Promise<string>;

    /** True when the bucket answers. */
    ping(): Promise<boolean>;
}
