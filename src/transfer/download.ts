import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { CommandError, runtimeFailure, timedOut } from "../errors.js";
import { randomTag } from "../util/random.js";
import { shellQuote } from "../util/shell-quote.js";
import { decodePayload, parsePayloadInfo, type PayloadInfo } from "./codec.js";
import { collectChunks, markerText, parseMarkers, type MarkerLine } from "./markers.js";
import { buildHelperCommand, loadHelperSource } from "./remote-helper.js";
import {
  failureForMarker,
  prepareTransfer,
  restoreScreen,
  typeLine,
  waitForMarker,
  waitForPrompt,
  type TransferContext
} from "./session.js";

export type DownloadStrategy = "pipe" | "page";

export interface DownloadRequest {
  session: string;
  remotePath: string;
  timeoutMs: number;
}

export interface DownloadResult {
  data: Buffer;
  info: PayloadInfo;
  strategy: DownloadStrategy;
}

// Room for "TH_C_<tag> <index> " in front of each chunk on one screen row.
const CHUNK_LINE_OVERHEAD = 24;
// Pipe output never reaches the screen's width limit, so chunks can be long.
const PIPE_CHUNK_WIDTH = 1024;
const PIPE_FLUSH_WAIT_MS = 2_000;
const TERMINAL_KINDS = ["END", "NOFILE", "NOPY", "ERR"] as const;

const isIntegrityFailure = (error: CommandError): boolean =>
  error.kind === "runtime" && error.message.startsWith("Integrity check failed");

interface Deadline {
  remaining(): number;
}

const assemble = (markers: readonly MarkerLine[], chunks: Map<number, string>): PayloadInfo | null => {
  collectChunks(markers, chunks);
  const info = markers.find((marker) => marker.kind === "INFO");
  return info ? parsePayloadInfo(info.detail) : null;
};

const finish = (
  info: PayloadInfo | null,
  chunks: ReadonlyMap<number, string>,
  strategy: DownloadStrategy
): DownloadResult => {
  if (!info) {
    throw runtimeFailure("Integrity check failed: transfer header was not received");
  }
  return { data: decodePayload(chunks, info), info, strategy };
};

const readPipeFile = async (file: string): Promise<string> => {
  try {
    return await fs.readFile(file, "utf8");
  } catch {
    return "";
  }
};

/** Runs the helper with the pane piped to `capture`; the pipe and the file are gone afterwards. */
const runPipedHelper = async (
  ctx: TransferContext,
  request: DownloadRequest,
  source: string,
  deadline: Deadline,
  tag: string
): Promise<{ marker: MarkerLine; text: string }> => {
  const { session } = request;
  const capture = path.join(os.tmpdir(), `termhand-download-${tag}.log`);
  await ctx.tmux.pipePane(session, `cat >> ${shellQuote(capture)}`);
  try {
    return await readPipedHelper(ctx, request, source, deadline, tag, capture);
  } finally {
    await ctx.tmux.stopPipe(session);
    await fs.rm(capture, { force: true });
  }
};

const readPipedHelper = async (
  ctx: TransferContext,
  request: DownloadRequest,
  source: string,
  deadline: Deadline,
  tag: string,
  capture: string
): Promise<{ marker: MarkerLine; text: string }> => {
  const { session } = request;
  await typeLine(
    ctx,
    session,
    buildHelperCommand(source, tag, ["download", tag, request.remotePath, "pipe", String(PIPE_CHUNK_WIDTH), "0"])
  );
  const sighting = await waitForMarker(ctx, session, tag, TERMINAL_KINDS, deadline.remaining());
  if (sighting.marker.kind !== "END") {
    return { marker: sighting.marker, text: "" };
  }

  // The screen can be ahead of the pipe reader; give the file a moment to catch up.
  const endLine = markerText("END", tag);
  const flushDeadline = ctx.clock.now() + Math.min(PIPE_FLUSH_WAIT_MS, Math.max(0, deadline.remaining()));
  let text = await readPipeFile(capture);
  while (!text.includes(endLine) && ctx.clock.now() < flushDeadline) {
    await ctx.clock.sleep(ctx.pollIntervalMs);
    text = await readPipeFile(capture);
  }
  return { marker: sighting.marker, text };
};

/** Output is copied by `pipe-pane` into a local file, so the screen size does not matter. */
const downloadViaPipe = async (
  ctx: TransferContext,
  request: DownloadRequest,
  source: string,
  deadline: Deadline
): Promise<DownloadResult> => {
  const { session } = request;
  const tag = randomTag();
  const { marker, text } = await runPipedHelper(ctx, request, source, deadline, tag);

  await restoreScreen(ctx, session);
  if (marker.kind !== "END") {
    throw failureForMarker(marker, request.remotePath);
  }
  const chunks = new Map<number, string>();
  const info = assemble(parseMarkers(text.split("\n"), tag), chunks);
  return finish(info, chunks, "pipe");
};

/**
 * Reads the chunks off the visible screen a page at a time. Each page fits
 * the screen and the helper holds the next one back until Enter is pressed.
 */
const downloadViaPages = async (
  ctx: TransferContext,
  request: DownloadRequest,
  source: string,
  deadline: Deadline
): Promise<DownloadResult> => {
  const { session } = request;
  const snapshot = await waitForPrompt(ctx, session);
  const width = snapshot.cols - CHUNK_LINE_OVERHEAD;
  const pageRows = snapshot.rows - 4;
  if (pageRows < 1) {
    throw runtimeFailure(`Terminal too short for a paged download: ${snapshot.rows} rows`);
  }

  const tag = randomTag();
  await typeLine(
    ctx,
    session,
    buildHelperCommand(source, tag, [
      "download",
      tag,
      request.remotePath,
      "page",
      String(width),
      String(pageRows)
    ])
  );

  const chunks = new Map<number, string>();
  let info: PayloadInfo | null = null;
  let lastPage = -1;
  for (;;) {
    const sighting = await waitForMarker(
      ctx,
      session,
      tag,
      ["PAGE", ...TERMINAL_KINDS],
      deadline.remaining(),
      (marker) => marker.kind !== "PAGE" || Number.parseInt(marker.detail, 10) > lastPage
    );
    info = assemble(parseMarkers(sighting.lines, tag), chunks) ?? info;

    if (sighting.marker.kind === "PAGE") {
      lastPage = Number.parseInt(sighting.marker.detail, 10);
      ctx.note(`Read page ${lastPage + 1} (${chunks.size} chunk(s) so far)`);
      await ctx.tmux.sendKeys(session, ["Enter"]);
      continue;
    }
    await restoreScreen(ctx, session);
    if (sighting.marker.kind !== "END") {
      throw failureForMarker(sighting.marker, request.remotePath);
    }
    return finish(info, chunks, "page");
  }
};

/**
 * Fetches a remote file through the terminal. The pipe strategy is tried
 * first; if its payload fails verification the paged strategy runs once and
 * is remembered for the session.
 */
export const downloadBuffer = async (
  ctx: TransferContext,
  request: DownloadRequest
): Promise<DownloadResult> => {
  const { session } = request;
  await prepareTransfer(ctx, session, "download");

  const startedAt = ctx.clock.now();
  const deadline: Deadline = {
    remaining: () => request.timeoutMs - (ctx.clock.now() - startedAt)
  };
  const source = await loadHelperSource();

  const remembered = await ctx.store.get(session, "dl_strategy");
  const pane = await ctx.tmux.describePane(session);
  if (remembered === "page" || pane.piping) {
    ctx.note(
      `Strategy: page (${remembered === "page" ? "remembered for this session" : "pane output is already piped"})`
    );
    return downloadViaPages(ctx, request, source, deadline);
  }

  ctx.note("Strategy: pipe");
  try {
    return await downloadViaPipe(ctx, request, source, deadline);
  } catch (error) {
    if (!(error instanceof CommandError) || !isIntegrityFailure(error)) {
      throw error;
    }
    if (deadline.remaining() <= 0) {
      throw timedOut("Timeout: no time left to retry the download with paging");
    }
    ctx.logger.error("[download] pipe strategy failed:", error.message);
    ctx.note(`Pipe transfer failed (${error.message}); retrying with paging`);
    await ctx.store.set(session, "dl_strategy", "page");
    return downloadViaPages(ctx, request, source, deadline);
  }
};
