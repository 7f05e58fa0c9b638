import "dotenv/config";

import { runProbeCommand } from "../src/cli/probe";

runProbeCommand("gemini", process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error) => {
    console.error("[gemini] unexpected failure", error);
    process.exitCode = 1;
  });
