#!/usr/bin/env tsx
import { createLogger } from "@bitfit/shared";
import { main } from "./main";

const logger = createLogger("bitfit");

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    logger.fatal({ err: error }, "bitfit failed");
    process.exitCode = 1;
  }
);
