#!/usr/bin/env node
import { buildProgram } from "./program.js";

async function main(): Promise<void> {
  const program = buildProgram({
    io: { stdout: process.stdout, stderr: process.stderr },
    env: process.env
  });
  const argv = [...process.argv];
  // npm script forwarding can leave a standalone "--" ahead of the command.
  if (argv[2] === "--") {
    argv.splice(2, 1);
  }
  await program.parseAsync(argv);
}

main().catch((error) => {
  process.stderr.write(`Error: ${error instanceof Error ? error.message : String(error)}\n`);
  process.exit(1);
});
