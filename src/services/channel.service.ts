import { connectAsync } from "mqtt";
import type { IClientOptions } from "mqtt";
import logger from "../utils/logger";
import {
  AuthenticationError,
  ConnectionError,
  UploadError,
  errorCode,
} from "../utils/errors";
import { MessageInbox, type MessagePredicate } from "../utils/inbox";
import type { ChannelMessage } from "../models/upload.model";

export interface MessageChannel {
  connect(): Promise<void>;
  subscribe(topic: string): Promise<void>;
  publish(topic: string, payload: string): Promise<void>;
  awaitMessage(
    predicate: MessagePredicate,
    timeoutMs: number,
  ): Promise<ChannelMessage | null>;
  disconnect(): Promise<void>;
}

export interface ChannelOptions {
  host: string;
  port: number;
  clientId: string;
  certificate: Buffer;
  privateKey: Buffer;
  keepaliveSeconds?: number;
  connectTimeoutMs?: number;
}

// The subset of MqttClient this service drives
export interface BrokerClient {
  on(
    event: "message",
    listener: (topic: string, payload: Buffer) => void,
  ): unknown;
  on(event: "error", listener: (error: Error) => void): unknown;
  on(event: "close", listener: () => void): unknown;
  subscribeAsync(
    topic: string,
    opts: { qos: 1 },
  ): Promise<Array<{ topic: string; qos: number }>>;
  publishAsync(topic: string, message: string, opts: { qos: 1 }): Promise<unknown>;
  endAsync(force?: boolean): Promise<void>;
}

export type BrokerConnector = (
  url: string,
  options: IClientOptions,
) => Promise<BrokerClient>;

const connectOnce: BrokerConnector = (url, options) =>
  connectAsync(url, options, false);

// CONNACK return codes: bad username or password, not authorized
const AUTH_REFUSAL_CODES = new Set([4, 5, 134, 135]);
const TLS_FAILURE_CODE =
  /^(ERR_SSL_|ERR_OSSL_|ERR_TLS_|CERT_|UNABLE_TO_|DEPTH_ZERO_|SELF_SIGNED_)/;
const SUBSCRIPTION_FAILURE_QOS = 128;

export function classifyConnectError(
  error: unknown,
  endpoint: string,
): UploadError {
  const code = errorCode(error);
  const message = error instanceof Error ? error.message : String(error);
  const details = { endpoint, code };

  if (typeof code === "number" && AUTH_REFUSAL_CODES.has(code)) {
    return new AuthenticationError(`Broker refused credentials: ${message}`, details, {
      cause: error,
    });
  }
  if (typeof code === "string" && TLS_FAILURE_CODE.test(code)) {
    return new AuthenticationError(`TLS handshake failed: ${message}`, details, {
      cause: error,
    });
  }
  return new ConnectionError(`Could not connect to ${endpoint}: ${message}`, details, {
    cause: error,
  });
}

/**
 * One mutually authenticated MQTT connection, owned by a single upload.
 */
export class ChannelService implements MessageChannel {
  private client: BrokerClient | null = null;
  private isConnected: boolean = false;
  private closing: boolean = false;
  private readonly inbox = new MessageInbox();
  private readonly endpoint: string;

  constructor(
    private readonly options: ChannelOptions,
    private readonly connector: BrokerConnector = connectOnce,
  ) {
    this.endpoint = `${options.host}:${options.port}`;
  }

  async connect(): Promise<void> {
    if (this.client) {
      throw new Error("ChannelService already connected");
    }

    logger.info(`Connecting to MQTT broker: ${this.endpoint}`);

    let client: BrokerClient;
    try {
      client = await this.connector(`mqtts://${this.endpoint}`, {
        clientId: this.options.clientId,
        cert: this.options.certificate,
        key: this.options.privateKey,
        rejectUnauthorized: true,
        protocolVersion: 4,
        clean: true,
        keepalive: this.options.keepaliveSeconds ?? 60,
        connectTimeout: this.options.connectTimeoutMs ?? 30_000,
        reconnectPeriod: 0,
      });
    } catch (error) {
      logger.error({ err: error, endpoint: this.endpoint }, "Failed to connect to MQTT broker");
      throw classifyConnectError(error, this.endpoint);
    }

    client.on("message", (topic, payload) => {
      logger.debug({ topic, bytes: payload.length }, "Received message");
      this.inbox.push({ topic, payload });
    });
    client.on("error", (err) => logger.error({ err }, "MQTT client error"));
    client.on("close", () => {
      this.isConnected = false;
      if (!this.closing) {
        logger.warn("Connection to MQTT broker closed unexpectedly");
        this.inbox.fail(
          new ConnectionError("Connection to broker closed unexpectedly", {
            endpoint: this.endpoint,
          }),
        );
      }
    });

    this.client = client;
    this.isConnected = true;
    logger.info("Connected to MQTT broker");
  }

  async subscribe(topic: string): Promise<void> {
    const client = this.requireConnection();

    let grants: Array<{ topic: string; qos: number }>;
    try {
      grants = await client.subscribeAsync(topic, { qos: 1 });
    } catch (error) {
      logger.error({ err: error, topic }, "Error subscribing to topic");
      throw new ConnectionError(`Subscription to ${topic} failed`, { topic }, { cause: error });
    }

    if (grants.some((grant) => grant.qos === SUBSCRIPTION_FAILURE_QOS)) {
      throw new AuthenticationError(`Broker refused subscription to ${topic}`, {
        topic,
      });
    }
    logger.info(`Subscribed to response topic: ${topic}`);
  }

  async publish(topic: string, payload: string): Promise<void> {
    const client = this.requireConnection();

    try {
      await client.publishAsync(topic, payload, { qos: 1 });
      logger.info(`Published message to ${topic}`);
    } catch (error) {
      logger.error({ err: error, topic }, "Error publishing message");
      throw new ConnectionError(`Publish to ${topic} failed`, { topic }, { cause: error });
    }
  }

  awaitMessage(
    predicate: MessagePredicate,
    timeoutMs: number,
  ): Promise<ChannelMessage | null> {
    this.requireConnection();
    return this.inbox.await(predicate, timeoutMs);
  }

  async disconnect(): Promise<void> {
    const client = this.client;
    if (!client || this.closing) return;

    this.closing = true;
    try {
      await client.endAsync();
      logger.info("MQTT client disconnected");
    } catch (error) {
      logger.error({ err: error }, "Error disconnecting from MQTT broker");
    } finally {
      this.isConnected = false;
    }
  }

  private requireConnection(): BrokerClient {
    if (!this.client || !this.isConnected) {
      throw new ConnectionError("ChannelService not connected", {
        endpoint: this.endpoint,
      });
    }
    return this.client;
  }
}
