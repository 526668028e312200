#!/usr/bin/env node
import { buildProgram } from "./cli";

async function main() {
  await buildProgram().parseAsync(process.argv);
}

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`Error: ${message}`);
  process.exit(1);
});
