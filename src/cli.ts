#!/usr/bin/env node
import process from "process";
import { Effect, Either } from "effect";
import { helpText, parseCliArgs } from "./cli/args.js";
import { decodeFromEnv, formatConfigError } from "./config/index.js";
import { logStartup } from "./logging.js";
import { runBridge } from "./server.js";

const cli = parseCliArgs(process.argv.slice(2), process.env);

if (cli.help) {
  process.stdout.write(helpText());
  process.exit(0);
}

const config = Effect.runSync(Effect.either(decodeFromEnv(cli.env)));

if (Either.isLeft(config)) {
  logStartup(`invalid configuration:\n${formatConfigError(config.left)}`);
  process.exit(1);
} else {
  runBridge(config.right)
    .then((code) => {
      process.exit(code);
    })
    .catch((err) => {
      logStartup(`cli error: ${String(err)}`);
      process.exit(1);
    });
}
