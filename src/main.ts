import { runCli } from "./cli/cli";

try {
  process.exitCode = runCli(process.argv.slice(2));
} catch (err) {
  console.error(err);
  process.exitCode = 1;
}
