export interface CommandIO {
  out(line: string): void;
  err(line: string): void;
  /** Raw bytes for commands whose payload is the output, e.g. `download -`. */
  writeStdout(data: Buffer): void;
  readStdin(): Promise<Buffer>;
  readonly stdinIsTTY: boolean;
}

export const processIO: CommandIO = {
  out: (line) => {
    process.stdout.write(`${line}\n`);
  },
  err: (line) => {
    process.stderr.write(`${line}\n`);
  },
  writeStdout: (data) => {
    process.stdout.write(data);
  },
  readStdin: async () => {
    const chunks: Buffer[] = [];
    for await (const chunk of process.stdin) {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
    }
    return Buffer.concat(chunks);
  },
  get stdinIsTTY() {
    return process.stdin.isTTY === true;
  }
};
