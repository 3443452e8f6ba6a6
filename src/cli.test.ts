import { describe, expect, it, vi } from "vitest";
import { main, parseArguments } from "./cli";
import { UploadService } from "./services/upload.service";
import { FakeChannel } from "./testing/fake-channel";
import type { ChannelOptions } from "./services/channel.service";
import type { TransferResult } from "./models/upload.model";

const UPLOAD_ID = "3c9a5b7d-0000-4000-8000-000000000003";

const env = {
  ULOGGER_CUSTOMER_ID: "12",
  ULOGGER_APPLICATION_ID: "34",
  ULOGGER_DEVICE_TYPE: "sensor-board",
  ULOGGER_CERT_DATA: "test-cert",
  ULOGGER_KEY_DATA: "test-key",
};

const buildArgs = ["--version", "1.2.3", "--git_hash", "abc123", "--branch", "main", "--file", "firmware.axf"];

function harness(respond = true) {
  const channel = new FakeChannel();
  if (respond) {
    channel.onPublish = () =>
      channel.deliver(`upload/v0/12/${UPLOAD_ID}`, {
        upload_id: UPLOAD_ID,
        presigned_url: "https://storage.test/firmware.axf",
      });
  }
  const createChannel = vi.fn((_options: ChannelOptions) => channel);
  const upload = vi.fn(
    async (): Promise<TransferResult> => ({ size: 10, sha256: "test-digest", status: 200 }),
  );
  const service = new UploadService({
    createChannel,
    generateId: () => UPLOAD_ID,
    uploader: {
      inspect: async () => ({ fileName: "firmware.axf", fileSize: 10 }),
      upload,
    },
  });
  return { channel, createChannel, upload, service };
}

describe("parseArguments", () => {
  it("maps snake_case flags onto uploader parameters", async () => {
    const { params, verbose } = await parseArguments([
      ...buildArgs,
      "--customer_id",
      "12",
      "--device_type",
      "sensor-board",
      "--cert_path",
      "certs/device.crt",
      "--timeout",
      "5",
    ]);

    expect(verbose).toBe(false);
    expect(params).toMatchObject({
      customerId: "12",
      deviceType: "sensor-board",
      version: "1.2.3",
      gitHash: "abc123",
      branch: "main",
      file: "firmware.axf",
      certPath: "certs/device.crt",
      timeout: 5,
    });
    expect(params.applicationId).toBeUndefined();
  });
});

describe("main", () => {
  it("exits 0 after a confirmed transfer", async () => {
    const { channel, upload, service } = harness();

    const exitCode = await main(buildArgs, env, service);

    expect(exitCode).toBe(0);
    expect(upload).toHaveBeenCalledTimes(1);
    expect(channel.ops().at(-1)).toBe("disconnect");
  });

  it("fails with a configuration error before connecting when no certificate is available", async () => {
    const { createChannel, service } = harness();
    const readFile = vi.fn(() => Buffer.from("unused"));

    const exitCode = await main(
      [...buildArgs, "--cert_path", "", "--key_path", ""],
      { ...env, ULOGGER_CERT_DATA: "", ULOGGER_KEY_DATA: "" },
      service,
      readFile,
    );

    expect(exitCode).toBe(2);
    expect(createChannel).not.toHaveBeenCalled();
    expect(readFile).not.toHaveBeenCalled();
  });

  it("exits non-zero when no response arrives before the timeout", async () => {
    vi.useFakeTimers();
    try {
      const { channel, upload, service } = harness(false);

      const exitCode = main([...buildArgs, "--timeout", "1"], env, service);
      await channel.waiting;
      await vi.advanceTimersByTimeAsync(1000);

      expect(await exitCode).toBe(5);
      expect(upload).not.toHaveBeenCalled();
    } finally {
      vi.useRealTimers();
    }
  });

  it("treats unknown flags as a configuration error", async () => {
    const { createChannel, service } = harness();

    await expect(main([...buildArgs, "--bogus", "1"], env, service)).resolves.toBe(2);
    expect(createChannel).not.toHaveBeenCalled();
  });
});
