import "dotenv/config";

import { runProbeCommand } from "../src/cli/probe";

runProbeCommand("populate", process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error) => {
    console.error("[probe] unexpected failure", error);
    process.exitCode = 1;
  });
