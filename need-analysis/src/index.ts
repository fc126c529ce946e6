import "dotenv/config";
import { runCli } from "./cli.ts";

const outcome = runCli(process.argv.slice(2));

if (outcome.stdout) process.stdout.write(outcome.stdout);
if (outcome.stderr) process.stderr.write(outcome.stderr);
process.exitCode = outcome.exitCode;
