import yargs from "yargs";
import logger from "./utils/logger";
import { ConfigurationError, describeFailure } from "./utils/errors";
import {
  DEFAULT_TIMEOUT_SECONDS,
  resolveConfig,
  type Environment,
  type ReadFile,
  type UploaderParameters,
} from "./utils/config";
import { UploadService } from "./services/upload.service";

export interface CliArguments {
  params: UploaderParameters;
  verbose: boolean;
}

function buildParser(args: string[]) {
  return yargs(args)
    .scriptName("axf-upload")
    .usage(
      "$0 --version <version> --git_hash <hash> --branch <branch> --file <path.axf>",
    )
    .version(false)
    .option("customer_id", {
      type: "string",
      describe: "Customer identifier (or set ULOGGER_CUSTOMER_ID)",
    })
    .option("application_id", {
      type: "string",
      describe: "Application identifier (or set ULOGGER_APPLICATION_ID)",
    })
    .option("device_type", {
      type: "string",
      describe: "Device type (or set ULOGGER_DEVICE_TYPE)",
    })
    .option("version", { type: "string", describe: "Software version number" })
    .option("git_hash", { type: "string", describe: "Git hash for the firmware" })
    .option("branch", { type: "string", describe: "Branch name to include in upload request" })
    .option("file", { type: "string", describe: "AXF file to upload" })
    .option("cert_path", {
      type: "string",
      describe: "Path to certificate file (default certificate.pem.crt)",
    })
    .option("key_path", {
      type: "string",
      describe: "Path to private key file (default private.pem.key)",
    })
    .option("cert_data", {
      type: "string",
      describe: "Certificate PEM data (or set ULOGGER_CERT_DATA); overrides cert_path",
    })
    .option("key_data", {
      type: "string",
      describe: "Private key PEM data (or set ULOGGER_KEY_DATA); overrides key_path",
    })
    .option("timeout", {
      type: "number",
      describe: `Seconds to wait for the upload response (default ${DEFAULT_TIMEOUT_SECONDS})`,
    })
    .option("verbose", { type: "boolean", default: false, describe: "Debug logging" })
    .strict()
    .help()
    .fail((message, error) => {
      throw error ?? new ConfigurationError(message, "arguments");
    });
}

export async function parseArguments(args: string[]): Promise<CliArguments> {
  const argv = await buildParser(args).parseAsync();

  return {
    params: {
      customerId: argv.customer_id,
      applicationId: argv.application_id,
      deviceType: argv.device_type,
      version: argv.version,
      gitHash: argv.git_hash,
      branch: argv.branch,
      file: argv.file,
      certPath: argv.cert_path,
      keyPath: argv.key_path,
      certData: argv.cert_data,
      keyData: argv.key_data,
      timeout: argv.timeout,
    },
    verbose: argv.verbose,
  };
}

/**
 * Resolves configuration, runs the upload and maps the outcome to an exit code.
 */
export async function main(
  args: string[],
  env: Environment,
  service: UploadService = new UploadService(),
  readFile?: ReadFile,
): Promise<number> {
  try {
    const { params, verbose } = await parseArguments(args);
    if (verbose) {
      logger.level = "debug";
    }

    const config = resolveConfig(params, env, readFile);
    const outcome = await service.run(config);

    logger.info(
      { uploadId: outcome.uploadId, size: outcome.size, sha256: outcome.sha256 },
      "Upload completed successfully!",
    );
    return 0;
  } catch (error) {
    const report = describeFailure(error);
    logger.error(report.context, `Upload failed: ${report.message}`);
    return report.exitCode;
  }
}
