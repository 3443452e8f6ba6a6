import { v4 as uuidv4 } from "uuid";
import logger from "../utils/logger";
import {
  ChannelService,
  type ChannelOptions,
  type MessageChannel,
} from "./channel.service";
import { UploadExchange } from "./exchange.service";
import uploaderService, { type UploaderService } from "./uploader.service";
import type {
  TransferResult,
  UploadRequest,
  UploaderConfig,
} from "../models/upload.model";

export type ArtifactUploader = Pick<UploaderService, "inspect" | "upload">;

export interface UploadDependencies {
  createChannel: (options: ChannelOptions) => MessageChannel;
  uploader: ArtifactUploader;
  generateId: () => string;
}

const defaultDependencies: UploadDependencies = {
  createChannel: (options) => new ChannelService(options),
  uploader: uploaderService,
  generateId: () => uuidv4(),
};

export interface UploadOutcome extends TransferResult {
  uploadId: string;
}

/**
 * Runs one upload: inspect the artifact, request a target over the channel,
 * transfer the file, and always release the connection.
 */
export class UploadService {
  private readonly deps: UploadDependencies;
  private activeChannel: MessageChannel | null = null;

  constructor(deps: Partial<UploadDependencies> = {}) {
    this.deps = { ...defaultDependencies, ...deps };
  }

  async run(config: Readonly<UploaderConfig>): Promise<UploadOutcome> {
    const { credentials, artifact, broker } = config;

    // Fails before any network activity when the artifact is missing
    const { fileName, fileSize } = await this.deps.uploader.inspect(artifact.filePath);

    const uploadId = this.deps.generateId();
    const request: UploadRequest = {
      upload_id: uploadId,
      customer_id: credentials.customerId,
      application_id: credentials.applicationId,
      device_type: credentials.deviceType,
      version_number: artifact.version,
      git_hash: artifact.gitHash,
      branch: artifact.branch,
      file_name: fileName,
      file_size: fileSize,
    };

    logger.info(
      {
        uploadId,
        customerId: credentials.customerId,
        deviceType: credentials.deviceType,
        file: fileName,
      },
      "Starting upload",
    );

    const channel = this.deps.createChannel({
      host: broker.host,
      port: broker.port,
      clientId: `cust-${credentials.customerId}-uploader-${uploadId}`,
      certificate: credentials.certificate,
      privateKey: credentials.privateKey,
    });
    this.activeChannel = channel;

    try {
      await channel.connect();

      const exchange = new UploadExchange(channel, request, config.timeoutSeconds);
      const target = await exchange.execute();

      const result = await this.deps.uploader.upload(target, artifact.filePath);
      logger.info({ uploadId }, "Complete upload workflow finished successfully");
      return { ...result, uploadId };
    } finally {
      this.activeChannel = null;
      await channel.disconnect();
    }
  }

  /**
   * Closes the connection of an in-flight run, if any.
   */
  async abort(): Promise<void> {
    const channel = this.activeChannel;
    this.activeChannel = null;
    if (channel) {
      await channel.disconnect();
    }
  }
}
