import "dotenv/config";

import { runProvision } from "../src/cli/db";
import { closePool } from "../src/store/postgres";

runProvision(process.argv.slice(2), { destructive: false })
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error) => {
    console.error("[provision] unexpected failure", error);
    process.exitCode = 1;
  })
  .finally(() => closePool())
  .catch((error) => {
    console.error("[provision] failed to close the database pool", error);
    process.exitCode = 1;
  });
