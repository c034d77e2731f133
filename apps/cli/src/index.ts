// apps/cli/src/index.ts
//
// Terminal entry point. Wires the game loop to stdin/stdout and sends pino
// diagnostics to stderr so they never interleave with the game transcript.
//
//   LOG_LEVEL=info npm start   # show game/guess events on stderr

import 'dotenv/config';
import pino from 'pino';

import { loadConfig } from './config.js';
import { runGame } from './game.js';
import { createTerminalIO } from './terminal.js';

const config = loadConfig();
const log = pino({ level: config.logLevel }, pino.destination(2));

async function main(): Promise<void> {
  const io = createTerminalIO(process.stdin, process.stdout);
  try {
    const summaries = await runGame(io, {
      config,
      logger: log,
      color: process.stdout.isTTY === true && !process.env.NO_COLOR,
    });
    log.debug({ games: summaries.length }, 'session ended');
  } finally {
    io.close();
  }
}

main().catch((err: unknown) => {
  log.fatal({ err }, 'cli crashed');
  process.exitCode = 1;
});
