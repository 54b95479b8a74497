#!/usr/bin/env node

import { createRequire } from "node:module";
import { parseArgs, helpText } from "./args.js";
import { createCodec } from "./codecs/index.js";
import { BatchConverter } from "./converter.js";
import { errorMessage } from "./errors.js";
import { ConsoleReporter } from "./reporter.js";

const require = createRequire(import.meta.url);
const { version: VERSION } = require("../package.json") as { version: string };

async function main(): Promise<number> {
  const parsed = parseArgs(process.argv);

  switch (parsed.kind) {
    case "help":
      console.log(helpText(VERSION));
      return 0;
    case "version":
      console.log(VERSION);
      return 0;
    case "error":
      console.error(`Error: ${parsed.error.message}`);
      console.error("Run heic2webp --help for usage");
      return 1;
    case "run":
      break;
  }

  const { config } = parsed;
  const converter = new BatchConverter(createCodec(config.codec), new ConsoleReporter(config.verbose));
  const summary = await converter.run(config);

  return summary.failureCount > 0 ? 1 : 0;
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(`Error: ${errorMessage(err)}`);
    process.exitCode = 1;
  }
);
