import fs from "fs";
import path from "path";
import crypto from "crypto";
import { Transform } from "stream";
import type { Readable } from "stream";
import axios, { type RawAxiosRequestHeaders } from "axios";
import logger from "../utils/logger";
import { ConfigurationError, TransferError, errorCode } from "../utils/errors";
import type {
  ArtifactInfo,
  TransferResult,
  UploadTarget,
} from "../models/upload.model";

export const STREAMING_THRESHOLD_BYTES = 8 * 1024 * 1024;

export interface TransferRequestConfig {
  headers: RawAxiosRequestHeaders;
  maxBodyLength: number;
  maxContentLength: number;
  validateStatus: (status: number) => boolean;
}

export interface TransferResponse {
  status: number;
  statusText: string;
  data: unknown;
}

export type HttpPut = (
  url: string,
  body: Buffer | Readable,
  config: TransferRequestConfig,
) => Promise<TransferResponse>;

const axiosPut: HttpPut = (url, body, config) => axios.put(url, body, config);

function isSuccess(status: number): boolean {
  return status >= 200 && status < 300;
}

function describeBody(data: unknown): string {
  if (typeof data === "string") return data.slice(0, 500);
  if (Buffer.isBuffer(data)) return data.toString("utf8").slice(0, 500);
  return "";
}

export class UploaderService {
  constructor(
    private readonly put: HttpPut = axiosPut,
    private readonly streamingThreshold: number = STREAMING_THRESHOLD_BYTES,
  ) {}

  async inspect(filePath: string): Promise<ArtifactInfo> {
    let stats: fs.Stats;
    try {
      stats = await fs.promises.stat(filePath);
    } catch (error) {
      throw new ConfigurationError(`File not found: ${filePath}`, "file", {
        cause: error,
      });
    }

    if (!stats.isFile()) {
      throw new ConfigurationError(`Not a regular file: ${filePath}`, "file");
    }

    return { fileName: path.basename(filePath), fileSize: stats.size };
  }

  async upload(target: UploadTarget, filePath: string): Promise<TransferResult> {
    if (target.expiresAt && new Date(target.expiresAt) < new Date()) {
      throw new TransferError(`Upload target expired at ${target.expiresAt}`, {
        file: filePath,
      });
    }

    let size: number;
    try {
      size = (await fs.promises.stat(filePath)).size;
    } catch (error) {
      throw new TransferError(`File not found: ${filePath}`, { file: filePath }, {
        cause: error,
      });
    }
    const hash = crypto.createHash("sha256");
    const body = await this.readBody(filePath, size, hash);

    logger.info(`Uploading file ${filePath} (${size} bytes)`);

    let response: TransferResponse;
    try {
      response = await this.put(target.url, body, {
        headers: {
          "Content-Type": "application/octet-stream",
          ...target.headers,
          "Content-Length": size,
        },
        maxBodyLength: Infinity,
        maxContentLength: Infinity,
        validateStatus: () => true,
      });
    } catch (error) {
      const code = errorCode(error);
      const message = error instanceof Error ? error.message : "Unknown error";
      logger.error({ err: error, file: filePath }, "Error uploading file");
      throw new TransferError(
        `Upload failed: ${message}`,
        { code: code === undefined ? undefined : String(code), file: filePath },
        { cause: error },
      );
    }

    if (!isSuccess(response.status)) {
      logger.error(
        { status: response.status, body: describeBody(response.data) },
        "Storage rejected the upload",
      );
      throw new TransferError(
        `Upload failed with status ${response.status} ${response.statusText}`.trim(),
        { status: response.status, file: filePath },
      );
    }

    const sha256 = hash.digest("hex");
    logger.info({ size, sha256, status: response.status }, "File uploaded successfully");
    return { size, sha256, status: response.status };
  }

  private async readBody(
    filePath: string,
    size: number,
    hash: crypto.Hash,
  ): Promise<Buffer | Readable> {
    if (size <= this.streamingThreshold) {
      let data: Buffer;
      try {
        data = await fs.promises.readFile(filePath);
      } catch (error) {
        throw new TransferError(`Could not read ${filePath}`, { file: filePath }, {
          cause: error,
        });
      }
      hash.update(data);
      return data;
    }

    logger.debug(`Streaming ${filePath} (${size} bytes)`);
    const hashing = new Transform({
      transform(chunk: Buffer, _encoding, callback) {
        hash.update(chunk);
        callback(null, chunk);
      },
    });
    const source = fs.createReadStream(filePath);
    source.on("error", (error) => hashing.destroy(error));
    return source.pipe(hashing);
  }
}

export default new UploaderService();
