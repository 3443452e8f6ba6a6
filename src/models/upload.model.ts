export interface Credentials {
  customerId: number;
  applicationId: number;
  deviceType: string;
  certificate: Buffer;
  privateKey: Buffer;
}

export interface BrokerEndpoint {
  host: string;
  port: number;
}

export interface ArtifactOptions {
  filePath: string;
  version: string;
  gitHash: string;
  branch: string;
}

export interface UploaderConfig {
  credentials: Readonly<Credentials>;
  broker: Readonly<BrokerEndpoint>;
  artifact: Readonly<ArtifactOptions>;
  timeoutSeconds: number;
}

export interface ArtifactInfo {
  fileName: string;
  fileSize: number;
}

// Published to upload/v0/firmware/{customer_id}/{device_type}
export interface UploadRequest {
  upload_id: string;
  customer_id: number;
  application_id: number;
  device_type: string;
  version_number: string;
  git_hash: string;
  branch: string;
  file_name: string;
  file_size: number;
}

// Received on upload/v0/{customer_id}/{upload_id}
export interface UploadResponse {
  upload_id: string | number;
  presigned_url?: string | null;
  headers?: Record<string, string>;
  expires_at?: string;
  status?: string | number;
  error?: string | number | Record<string, unknown>;
  message?: string;
}

export interface UploadTarget {
  url: string;
  headers: Record<string, string>;
  expiresAt?: string;
}

export interface ChannelMessage {
  topic: string;
  payload: Buffer;
}

export type ExchangeState =
  | "idle"
  | "subscribed"
  | "published"
  | "fulfilled"
  | "timed_out"
  | "rejected";

export interface TransferResult {
  size: number;
  sha256: string;
  status: number;
}
