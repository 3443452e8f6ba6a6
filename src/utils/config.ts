import fs from "fs";
import Joi from "joi";
import type {
  BrokerEndpoint,
  Credentials,
  UploaderConfig,
} from "../models/upload.model";
import { ConfigurationError } from "./errors";

export const DEFAULT_BROKER_HOST = "mqtt.ulogger.ai";
export const DEFAULT_BROKER_PORT = 8883;
export const DEFAULT_TIMEOUT_SECONDS = 30;
export const DEFAULT_CERT_PATH = "certificate.pem.crt";
export const DEFAULT_KEY_PATH = "private.pem.key";
// Longest wait a Node timer can hold
export const MAX_TIMEOUT_SECONDS = 2147483;

export interface UploaderParameters {
  customerId?: string | number;
  applicationId?: string | number;
  deviceType?: string;
  version?: string;
  gitHash?: string;
  branch?: string;
  file?: string;
  certData?: string;
  keyData?: string;
  certPath?: string;
  keyPath?: string;
  timeout?: number;
}

export type Environment = Readonly<Record<string, string | undefined>>;

export type ReadFile = (filePath: string) => Buffer;

const idSchema = Joi.number().integer().min(0).required();
const portSchema = Joi.number().integer().min(1).max(65535).required();
const timeoutSchema = Joi.number().positive().max(MAX_TIMEOUT_SECONDS).required();

function present(value: string | number | undefined): value is string | number {
  if (value === undefined) return false;
  return typeof value === "number" || value.trim() !== "";
}

function pick(
  value: string | number | undefined,
  fallback: string | undefined,
): string | number | undefined {
  if (present(value)) return value;
  return present(fallback) ? fallback : undefined;
}

function requireValue(
  value: string | number | undefined,
  field: string,
  envName?: string,
): string | number {
  if (!present(value)) {
    const hint = envName ? ` and ${envName} environment variable not set` : "";
    throw new ConfigurationError(`${field} not provided${hint}`, field);
  }
  return value;
}

function validateNumber(
  schema: Joi.NumberSchema,
  value: string | number,
  field: string,
  expectation: string,
): number {
  const result = schema.validate(value);
  if (result.error || typeof result.value !== "number") {
    throw new ConfigurationError(`${field} must be ${expectation}`, field);
  }
  return result.value;
}

function resolveIdentifier(
  value: string | number | undefined,
  env: Environment,
  field: string,
  envName: string,
): number {
  const raw = requireValue(pick(value, env[envName]), field, envName);
  return validateNumber(idSchema, raw, field, "a non-negative integer");
}

// An explicitly empty path disables the default file name
function resolveMaterial(
  field: string,
  inline: string | undefined,
  filePath: string,
  readFile: ReadFile,
): Buffer {
  if (present(inline)) {
    return Buffer.from(inline, "utf8");
  }

  if (filePath.trim() === "") {
    throw new ConfigurationError(
      `${field} not provided: supply inline PEM data or a file path`,
      field,
    );
  }

  let content: Buffer;
  try {
    content = readFile(filePath);
  } catch (error) {
    throw new ConfigurationError(
      `${field} file could not be read: ${filePath}`,
      field,
      { cause: error },
    );
  }

  if (content.toString("utf8").trim() === "") {
    throw new ConfigurationError(`${field} file is empty: ${filePath}`, field);
  }
  return content;
}

function resolveBroker(env: Environment): BrokerEndpoint {
  const host = pick(undefined, env.ULOGGER_MQTT_HOST) ?? DEFAULT_BROKER_HOST;
  const port = pick(undefined, env.ULOGGER_MQTT_PORT) ?? DEFAULT_BROKER_PORT;

  return {
    host: String(host),
    port: validateNumber(portSchema, port, "mqtt_port", "a valid TCP port"),
  };
}

/**
 * Explicit parameters win; ULOGGER_* environment variables are the fallback.
 */
export function resolveConfig(
  params: UploaderParameters,
  env: Environment,
  readFile: ReadFile = (filePath) => fs.readFileSync(filePath),
): Readonly<UploaderConfig> {
  const customerId = resolveIdentifier(
    params.customerId,
    env,
    "customer_id",
    "ULOGGER_CUSTOMER_ID",
  );
  const applicationId = resolveIdentifier(
    params.applicationId,
    env,
    "application_id",
    "ULOGGER_APPLICATION_ID",
  );
  const deviceType = String(
    requireValue(
      pick(params.deviceType, env.ULOGGER_DEVICE_TYPE),
      "device_type",
      "ULOGGER_DEVICE_TYPE",
    ),
  ).trim();

  const version = String(requireValue(params.version, "version"));
  const gitHash = String(requireValue(params.gitHash, "git_hash"));
  const branch = String(requireValue(params.branch, "branch"));
  const filePath = String(requireValue(params.file, "file"));

  const timeoutSeconds = validateNumber(
    timeoutSchema,
    params.timeout ?? DEFAULT_TIMEOUT_SECONDS,
    "timeout",
    `a positive number of seconds, at most ${MAX_TIMEOUT_SECONDS}`,
  );

  const certificate = resolveMaterial(
    "certificate",
    pick(params.certData, env.ULOGGER_CERT_DATA)?.toString(),
    params.certPath ?? env.ULOGGER_CERT_PATH ?? DEFAULT_CERT_PATH,
    readFile,
  );
  const privateKey = resolveMaterial(
    "private_key",
    pick(params.keyData, env.ULOGGER_KEY_DATA)?.toString(),
    params.keyPath ?? env.ULOGGER_KEY_PATH ?? DEFAULT_KEY_PATH,
    readFile,
  );

  const credentials: Credentials = {
    customerId,
    applicationId,
    deviceType,
    certificate,
    privateKey,
  };

  return Object.freeze({
    credentials: Object.freeze(credentials),
    broker: Object.freeze(resolveBroker(env)),
    artifact: Object.freeze({ filePath, version, gitHash, branch }),
    timeoutSeconds,
  });
}
