import { reportError } from "./cli/errors";
import { main } from "./cli/main";

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    process.exitCode = reportError(error);
  });
