import type { CommandIO } from "../../src/util/io.js";

export class BufferedIO implements CommandIO {
  public readonly stdout: string[] = [];
  public readonly stderr: string[] = [];
  public readonly binary: Buffer[] = [];

  public constructor(
    private readonly stdin: Buffer = Buffer.alloc(0),
    public readonly stdinIsTTY = false
  ) {}

  public out(line: string): void {
    this.stdout.push(line);
  }

  public err(line: string): void {
    this.stderr.push(line);
  }

  public writeStdout(data: Buffer): void {
    this.binary.push(data);
  }

  public async readStdin(): Promise<Buffer> {
    return this.stdin;
  }
}
