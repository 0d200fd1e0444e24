/**
 * Send command - POST a validated file to the target API
 */

import { Command } from "commander";
import { join } from "path";
import { createContext, exitWithError, printResponse } from "../context.js";
import { sendFile } from "../../lib/sender/index.js";
import { VALIDATED_FILE_NAME } from "../../lib/validator/index.js";

interface SendCliOptions {
  input?: string;
}

export function createSendCommand(): Command {
  return new Command("send")
    .description("Send validated records to the target API")
    .option("--input <path>", `Validated file (default: <processed dir>/${VALIDATED_FILE_NAME})`)
    .action(async (options: SendCliOptions, command: Command) => {
      try {
        const { config, http } = createContext(command);
        const result = await sendFile(
          http,
          options.input ?? join(config.processedDataDir, VALIDATED_FILE_NAME),
          config.processedDataDir,
          { url: config.apiUrl, timeoutMs: config.httpTimeoutMs },
        );

        printResponse("send", {
          sent: result.sent,
          failed: result.failed,
          ...(result.errorsPath ? { errorsPath: result.errorsPath } : {}),
        });

        process.exit(0);
      } catch (error) {
        exitWithError(error, "send");
      }
    });
}
