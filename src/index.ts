#!/usr/bin/env node
import { main } from "./cli";

process.on("SIGINT", () => {
  console.log("\nInterrupted.");
  process.exit(1);
});

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error) => {
    console.error("Unhandled error:", error);
    process.exit(1);
  });
