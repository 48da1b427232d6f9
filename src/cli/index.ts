#!/usr/bin/env node
/**
 * jobcast CLI — send build/job state notifications from the shell.
 *
 * Commands:
 *   jobcast send       Send one notification to a destination
 *   jobcast validate   Check a destination without sending
 *   jobcast notify     Send to every configured endpoint
 */

import { runCli, type CliIo } from "./commands.js";

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString("utf-8");
}

const io: CliIo = {
  stdout: (line) => console.log(line),
  stderr: (line) => console.error(line),
  readStdin,
  env: process.env,
};

runCli(process.argv.slice(2), { io })
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error(err);
    process.exit(1);
  });
