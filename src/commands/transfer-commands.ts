import fs from "node:fs/promises";
import path from "node:path";
import { invalidInput } from "../errors.js";
import { downloadBuffer } from "../transfer/download.js";
import { uploadBuffer } from "../transfer/upload.js";
import { isDirectory, pathExists, writeFileAtomic } from "../util/files.js";
import { createTransferContext, timeoutToMs, type CommandContext } from "./context.js";

export const DEFAULT_TRANSFER_TIMEOUT_SECONDS = 60;

export interface UploadArgs {
  session: string;
  local: string;
  remote?: string;
  force: boolean;
  verbose: boolean;
  timeout: number;
}

export interface DownloadArgs {
  session: string;
  remote: string;
  local?: string;
  force: boolean;
  verbose: boolean;
  timeout: number;
}

const readUploadSource = async (ctx: CommandContext, local: string): Promise<Buffer> => {
  if (local === "-") {
    if (ctx.io.stdinIsTTY) {
      throw invalidInput("stdin is a terminal; pipe the content to upload from '-'");
    }
    return ctx.io.readStdin();
  }
  if (await isDirectory(local)) {
    throw invalidInput(`Local path is a directory: ${local}`);
  }
  try {
    return await fs.readFile(local);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw invalidInput(`Cannot read local file ${local}: ${message}`);
  }
};

export const upload = async (ctx: CommandContext, args: UploadArgs): Promise<void> => {
  const timeoutMs = timeoutToMs(args.timeout);
  if (args.local === "-" && !args.remote) {
    throw invalidInput("A remote path is required when uploading from stdin");
  }
  const remotePath = args.remote || path.basename(args.local);
  const data = await readUploadSource(ctx, args.local);
  if (data.length === 0) {
    throw invalidInput("Nothing to upload: input is empty");
  }

  const result = await uploadBuffer(createTransferContext(ctx, args.verbose), {
    session: args.session,
    data,
    remotePath,
    force: args.force,
    timeoutMs
  });
  ctx.io.out(
    `Uploaded ${args.local === "-" ? "stdin" : args.local} to ${result.remotePath} (${result.size} bytes)`
  );
};

export const download = async (ctx: CommandContext, args: DownloadArgs): Promise<void> => {
  const timeoutMs = timeoutToMs(args.timeout);
  if (args.remote.trim() === "") {
    throw invalidInput("Remote path must not be empty");
  }
  const local = args.local ?? path.basename(args.remote);
  const toStdout = local === "-";
  if (!toStdout) {
    if (await isDirectory(local)) {
      throw invalidInput(`Local path is a directory: ${local}`);
    }
    if (!(await isDirectory(path.dirname(path.resolve(local))))) {
      throw invalidInput(`Local directory does not exist: ${path.dirname(path.resolve(local))}`);
    }
    if (!args.force && (await pathExists(local))) {
      throw invalidInput(`Local file already exists: ${local} (use --force to overwrite)`);
    }
  }

  const transfer = createTransferContext(ctx, args.verbose);
  const result = await downloadBuffer(transfer, {
    session: args.session,
    remotePath: args.remote,
    timeoutMs
  });
  transfer.note(`Received ${result.info.size} bytes via ${result.strategy}; hash verified`);

  if (toStdout) {
    ctx.io.writeStdout(result.data);
    return;
  }
  await writeFileAtomic(local, result.data);
  ctx.io.out(`Downloaded ${args.remote} to ${local} (${result.data.length} bytes)`);
};
