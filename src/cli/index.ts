#!/usr/bin/env node
/**
 * someip-wire CLI - SOME/IP payloads from the command line.
 */

import { logger } from "./utils/logger.js";
import { parseArgs, getHelpText, getCommandHelp } from "./args.js";

const VERSION = "0.1.0";

async function main(): Promise<void> {
  const command = parseArgs();

  switch (command.type) {
    case "help":
      logger.raw(command.command !== undefined ? getCommandHelp(command.command) : getHelpText());
      break;

    case "version":
      logger.raw(`someip-wire v${VERSION}`);
      break;

    case "encode": {
      const { encode } = await import("./commands/encode.js");
      await encode(command.options);
      break;
    }

    case "decode": {
      const { decode } = await import("./commands/decode.js");
      await decode(command.options);
      break;
    }

    case "inspect": {
      const { inspect } = await import("./commands/inspect.js");
      await inspect(command.options);
      break;
    }

    case "invalid":
      logger.error(command.reason);
      logger.raw(getCommandHelp(command.command));
      process.exit(1);
      break;

    case "unknown":
      logger.error(`Unknown command: ${command.command}`);
      logger.raw("");
      logger.raw("Run 'someip-wire --help' for usage.");
      process.exit(1);
  }
}

main().catch((error: unknown) => {
  logger.failure(error);
  process.exit(1);
});
