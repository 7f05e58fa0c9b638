import "dotenv/config";

import { runVerify } from "../src/cli/db";
import { closePool } from "../src/store/postgres";

runVerify()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error) => {
    console.error("[verify] unexpected failure", error);
    process.exitCode = 1;
  })
  .finally(() => closePool())
  .catch((error) => {
    console.error("[verify] failed to close the database pool", error);
    process.exitCode = 1;
  });
