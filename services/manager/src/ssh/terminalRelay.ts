import type { Duplex, Readable, Writable } from "node:stream";

export interface TerminalStreams {
  input: Readable & { isTTY?: boolean; setRawMode?: (mode: boolean) => unknown };
  output: Writable & { rows?: number; columns?: number };
}

export function terminalSize(terminal: TerminalStreams): { rows: number; cols: number } {
  return { rows: terminal.output.rows ?? 24, cols: terminal.output.columns ?? 80 };
}

/**
 * Pipes the local terminal into `channel` and the channel back out until the remote side
 * closes or local input ends. Raw mode, when entered, is restored on every exit path.
 */
export async function relayTerminal(channel: Duplex, terminal: TerminalStreams): Promise<void> {
  const { input, output } = terminal;
  const raw = Boolean(input.isTTY && input.setRawMode);
  if (raw) input.setRawMode?.(true);

  try {
    await new Promise<void>((resolve, reject) => {
      const detach = () => {
        channel.removeListener("close", finish);
        channel.removeListener("error", fail);
        input.removeListener("end", finish);
      };
      const finish = () => {
        detach();
        resolve();
      };
      const fail = (err: Error) => {
        detach();
        reject(err);
      };
      channel.once("close", finish);
      channel.once("error", fail);
      input.once("end", finish);

      channel.pipe(output, { end: false });
      input.pipe(channel);
      input.resume();
    });
  } finally {
    input.unpipe(channel);
    channel.unpipe(output);
    if (raw) input.setRawMode?.(false);
    input.pause();
  }
}
