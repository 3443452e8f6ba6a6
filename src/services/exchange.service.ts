import Joi from "joi";
import logger from "../utils/logger";
import { RejectedError, TimedOutError } from "../utils/errors";
import type { MessageChannel } from "./channel.service";
import type {
  ChannelMessage,
  ExchangeState,
  UploadRequest,
  UploadResponse,
  UploadTarget,
} from "../models/upload.model";

export const requestTopic = (customerId: number, deviceType: string): string =>
  `upload/v0/firmware/${customerId}/${deviceType}`;

export const responseTopic = (customerId: number, uploadId: string): string =>
  `upload/v0/${customerId}/${uploadId}`;

const ACCEPTED_STATUSES = new Set(["ok", "success", "accepted"]);

const responseSchema = Joi.object<UploadResponse>({
  upload_id: Joi.alternatives(Joi.string(), Joi.number()).required(),
  presigned_url: Joi.string().allow(null, ""),
  headers: Joi.object().pattern(Joi.string(), Joi.string()),
  expires_at: Joi.string(),
  status: Joi.alternatives(Joi.string().allow(""), Joi.number()),
  error: Joi.alternatives(Joi.string().allow(""), Joi.number(), Joi.object()),
  message: Joi.string().allow(""),
}).unknown(true);

const targetUrlSchema = Joi.string().uri({ scheme: ["http", "https"] });

const TRANSITIONS: Record<ExchangeState, ReadonlyArray<ExchangeState>> = {
  idle: ["subscribed"],
  subscribed: ["published"],
  published: ["fulfilled", "timed_out", "rejected"],
  fulfilled: [],
  timed_out: [],
  rejected: [],
};

export function decodeResponse(payload: Buffer): Record<string, unknown> | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(payload.toString("utf8"));
  } catch (error) {
    logger.warn({ err: error }, "Failed to decode JSON message");
    return null;
  }

  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    logger.warn("Ignoring message that is not a JSON object");
    return null;
  }
  return Object.fromEntries(Object.entries(parsed));
}

function describeReason(error: UploadResponse["error"]): string | undefined {
  if (error === undefined || error === "") return undefined;
  return typeof error === "object" ? JSON.stringify(error) : String(error);
}

/**
 * A single request/await/fulfil exchange over a connected channel. Each
 * instance runs once: idle -> subscribed -> published -> fulfilled, or ends
 * in timed_out or rejected.
 */
export class UploadExchange {
  private state: ExchangeState = "idle";
  private readonly request: Readonly<UploadRequest>;
  private readonly replyTopic: string;
  private accepted: Record<string, unknown> | null = null;

  constructor(
    private readonly channel: MessageChannel,
    request: UploadRequest,
    private readonly timeoutSeconds: number,
  ) {
    this.request = Object.freeze({ ...request });
    this.replyTopic = responseTopic(request.customer_id, request.upload_id);
  }

  getState(): ExchangeState {
    return this.state;
  }

  async execute(): Promise<UploadTarget> {
    const { upload_id: uploadId } = this.request;
    if (this.state !== "idle") {
      throw new Error(`Exchange for ${uploadId} has already run`);
    }

    // Subscribe first so a fast reply cannot be missed
    await this.channel.subscribe(this.replyTopic);
    this.transition("subscribed");

    const topic = requestTopic(this.request.customer_id, this.request.device_type);
    logger.info({ uploadId, topic }, "Publishing upload request");
    await this.channel.publish(topic, JSON.stringify(this.request));
    this.transition("published");

    logger.info(`Waiting for upload response (timeout: ${this.timeoutSeconds}s)`);
    const message = await this.channel.awaitMessage(
      (candidate) => this.matches(candidate),
      this.timeoutSeconds * 1000,
    );

    const body = this.accepted;
    if (!message || !body) {
      this.transition("timed_out");
      throw new TimedOutError(uploadId, this.timeoutSeconds);
    }

    try {
      const target = this.extractTarget(body);
      this.transition("fulfilled");
      logger.info({ uploadId }, "Received upload target");
      return target;
    } catch (error) {
      this.transition("rejected");
      throw error;
    }
  }

  // Only topic and upload_id decide a match; the payload is validated later
  private matches(message: ChannelMessage): boolean {
    if (message.topic !== this.replyTopic) {
      logger.debug({ topic: message.topic }, "Ignoring message on unrelated topic");
      return false;
    }

    const body = decodeResponse(message.payload);
    if (!body) return false;

    const received = body.upload_id;
    if (
      (typeof received !== "string" && typeof received !== "number") ||
      String(received) !== this.request.upload_id
    ) {
      logger.warn(
        { expected: this.request.upload_id, received },
        "Ignoring response with mismatched upload_id",
      );
      return false;
    }

    this.accepted = body;
    return true;
  }

  private extractTarget(body: Record<string, unknown>): UploadTarget {
    const uploadId = this.request.upload_id;

    const result = responseSchema.validate(body);
    if (result.error || !result.value) {
      throw new RejectedError(
        uploadId,
        `malformed response: ${result.error?.message ?? "empty payload"}`,
      );
    }

    const response = result.value;
    const rawStatus = response.status === undefined ? "" : String(response.status).trim();
    const reason = describeReason(response.error);

    if (rawStatus !== "" && !ACCEPTED_STATUSES.has(rawStatus.toLowerCase())) {
      throw new RejectedError(
        uploadId,
        reason || response.message || `status ${rawStatus}`,
        rawStatus,
      );
    }
    if (reason) {
      throw new RejectedError(uploadId, reason, rawStatus || undefined);
    }
    if (!response.presigned_url) {
      throw new RejectedError(uploadId, "response did not include an upload target");
    }
    if (targetUrlSchema.validate(response.presigned_url).error) {
      throw new RejectedError(uploadId, "upload target is not a valid URL");
    }

    return {
      url: response.presigned_url,
      headers: response.headers ?? {},
      expiresAt: response.expires_at,
    };
  }

  private transition(next: ExchangeState): void {
    if (!TRANSITIONS[this.state].includes(next)) {
      throw new Error(`Invalid exchange transition: ${this.state} -> ${next}`);
    }
    logger.debug({ from: this.state, to: next }, "Exchange state changed");
    this.state = next;
  }
}
