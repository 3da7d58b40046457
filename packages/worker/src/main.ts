import { logError } from "@trailerbin/scraper";
import { main } from "./cli.js";

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    logError("fatal", err);
    process.exitCode = 1;
  });
