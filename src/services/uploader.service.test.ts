import fs from "fs";
import os from "os";
import path from "path";
import crypto from "crypto";
import type { Readable } from "stream";
import { AxiosError } from "axios";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  UploaderService,
  type HttpPut,
  type TransferResponse,
} from "./uploader.service";
import { ConfigurationError, TransferError } from "../utils/errors";
import type { UploadTarget } from "../models/upload.model";

const CONTENT = Buffer.from("firmware image bytes for testing");
const SHA256 = crypto.createHash("sha256").update(CONTENT).digest("hex");
const target: UploadTarget = {
  url: "https://storage.test/bucket/firmware.axf?X-Amz-Signature=test",
  headers: {},
};

async function collect(body: Buffer | Readable): Promise<Buffer> {
  if (Buffer.isBuffer(body)) return body;
  const chunks: Buffer[] = [];
  for await (const chunk of body) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
  }
  return Buffer.concat(chunks);
}

function respondWith(status: number, statusText = "") {
  const received: Buffer[] = [];
  const put = vi.fn<HttpPut>(async (_url, body): Promise<TransferResponse> => {
    received.push(await collect(body));
    return { status, statusText, data: "" };
  });
  return { put, received };
}

describe("UploaderService", () => {
  let dir: string;
  let filePath: string;

  beforeEach(async () => {
    dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), "axf-upload-"));
    filePath = path.join(dir, "firmware.axf");
    await fs.promises.writeFile(filePath, CONTENT);
  });

  afterEach(async () => {
    await fs.promises.rm(dir, { recursive: true, force: true });
  });

  describe("inspect", () => {
    it("reports the artifact name and size", async () => {
      const uploader = new UploaderService(respondWith(200).put);

      await expect(uploader.inspect(filePath)).resolves.toEqual({
        fileName: "firmware.axf",
        fileSize: CONTENT.length,
      });
    });

    it("raises a ConfigurationError for a missing file", async () => {
      const uploader = new UploaderService(respondWith(200).put);

      const error = await uploader.inspect(path.join(dir, "missing.axf")).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error).toMatchObject({ field: "file" });
    });

    it("rejects a directory", async () => {
      const uploader = new UploaderService(respondWith(200).put);

      await expect(uploader.inspect(dir)).rejects.toThrow(`Not a regular file: ${dir}`);
    });
  });

  describe("upload", () => {
    it("sends the file once with octet-stream headers", async () => {
      const { put, received } = respondWith(200, "OK");
      const uploader = new UploaderService(put);

      const result = await uploader.upload(target, filePath);

      expect(result).toEqual({ size: CONTENT.length, sha256: SHA256, status: 200 });
      expect(put).toHaveBeenCalledTimes(1);
      const [url, , config] = put.mock.calls[0];
      expect(url).toBe(target.url);
      expect(config.headers).toEqual({
        "Content-Type": "application/octet-stream",
        "Content-Length": CONTENT.length,
      });
      expect(received[0].equals(CONTENT)).toBe(true);
    });

    it("adds the headers required by the upload target", async () => {
      const { put } = respondWith(204);
      const uploader = new UploaderService(put);

      await uploader.upload({ ...target, headers: { "x-amz-meta-branch": "main" } }, filePath);

      expect(put.mock.calls[0][2].headers).toMatchObject({ "x-amz-meta-branch": "main" });
    });

    it("streams files above the threshold", async () => {
      const { put, received } = respondWith(201);
      const uploader = new UploaderService(put, 4);

      const result = await uploader.upload(target, filePath);

      expect(Buffer.isBuffer(put.mock.calls[0][1])).toBe(false);
      expect(received[0].equals(CONTENT)).toBe(true);
      expect(result.sha256).toBe(SHA256);
    });

    it("fails with the status code on a non-success response", async () => {
      const { put } = respondWith(403, "Forbidden");
      const uploader = new UploaderService(put);

      const error = await uploader.upload(target, filePath).catch((err: unknown) => err);

      expect(put).toHaveBeenCalledTimes(1);
      expect(error).toBeInstanceOf(TransferError);
      expect(error).toMatchObject({
        status: 403,
        message: "Upload failed with status 403 Forbidden",
        exitCode: 7,
      });
    });

    it("wraps transport failures with their error code", async () => {
      const put = vi.fn<HttpPut>(async () => {
        throw new AxiosError("connect ECONNREFUSED 127.0.0.1:443", "ECONNREFUSED");
      });
      const uploader = new UploaderService(put);

      const error = await uploader.upload(target, filePath).catch((err: unknown) => err);

      expect(put).toHaveBeenCalledTimes(1);
      expect(error).toBeInstanceOf(TransferError);
      expect(error).toMatchObject({
        code: "ECONNREFUSED",
        message: "Upload failed: connect ECONNREFUSED 127.0.0.1:443",
      });
    });

    it("refuses an expired upload target without sending anything", async () => {
      const { put } = respondWith(200);
      const uploader = new UploaderService(put);

      await expect(
        uploader.upload({ ...target, expiresAt: "2000-01-01T00:00:00Z" }, filePath),
      ).rejects.toThrow("Upload target expired at 2000-01-01T00:00:00Z");
      expect(put).not.toHaveBeenCalled();
    });
  });
});
