import { runCli } from "./cli";
import { derror } from "./utils/logger";

runCli(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    derror(err);
    process.exitCode = 1;
  },
);
