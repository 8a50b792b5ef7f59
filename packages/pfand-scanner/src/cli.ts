import { runCli } from "./cli/run-cli.js";

async function main() {
  process.exitCode = await runCli(process.argv.slice(2));
}

void main();
