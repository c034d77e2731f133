// apps/cli/src/terminal.ts
//
// GameIO over a pair of streams. Lines are pulled from readline's async
// iterator, which buffers them, so piped input that arrives faster than the
// game asks for it is queued rather than lost. Prompts are written directly
// to the output stream.

import { createInterface } from 'node:readline';
import type { GameIO } from './game.js';

export interface TerminalIO extends GameIO {
  close(): void;
}

export function createTerminalIO(
  input: NodeJS.ReadableStream,
  output: NodeJS.WritableStream,
): TerminalIO {
  const rl = createInterface({ input, terminal: false, crlfDelay: Infinity });
  const lines = rl[Symbol.asyncIterator]();
  let ended = false;

  return {
    async ask(prompt) {
      output.write(prompt);
      if (ended) return null;
      const next = await lines.next();
      if (next.done) {
        ended = true;
        return null;
      }
      return next.value;
    },
    print(line) {
      output.write(`${line}\n`);
    },
    close() {
      rl.close();
    },
  };
}
