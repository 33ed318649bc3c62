import { runtimeFailure } from "../errors.js";
import { randomTag } from "../util/random.js";
import { formatSeconds } from "../util/clock.js";
import { encodePayload } from "./codec.js";
import { buildHelperCommand, loadHelperSource } from "./remote-helper.js";
import {
  failureForMarker,
  prepareTransfer,
  restoreScreen,
  typeLine,
  waitForMarker,
  type TransferContext
} from "./session.js";

export interface UploadRequest {
  session: string;
  data: Buffer;
  remotePath: string;
  force: boolean;
  timeoutMs: number;
}

export interface UploadResult {
  remotePath: string;
  size: number;
  chunks: number;
  elapsedMs: number;
}

/**
 * Types the payload into a helper running in the session. The helper checks
 * the digest before it writes anything, then renames a temp file into place.
 */
export const uploadBuffer = async (
  ctx: TransferContext,
  request: UploadRequest
): Promise<UploadResult> => {
  const { session, remotePath } = request;
  const payload = encodePayload(request.data);
  await prepareTransfer(ctx, session, "upload");

  const startedAt = ctx.clock.now();
  const remaining = (): number => request.timeoutMs - (ctx.clock.now() - startedAt);
  const tag = randomTag();
  const source = await loadHelperSource();

  ctx.note(`Uploading ${payload.size} bytes as ${payload.count} chunk(s), sha256 ${payload.sha256}`);
  ctx.logger.log("[upload]", session, remotePath, `tag=${tag}`, `chunks=${payload.count}`);

  await typeLine(
    ctx,
    session,
    buildHelperCommand(source, tag, [
      "upload",
      tag,
      remotePath,
      request.force ? "1" : "0",
      payload.sha256,
      String(payload.count)
    ])
  );

  const ready = await waitForMarker(
    ctx,
    session,
    tag,
    ["READY", "EXISTS", "NOWRITE", "NOPY", "ERR"],
    remaining()
  );
  if (ready.marker.kind !== "READY") {
    await restoreScreen(ctx, session);
    throw failureForMarker(ready.marker, remotePath);
  }

  for (const [index, chunk] of payload.chunks.entries()) {
    await typeLine(ctx, session, `${index}:${chunk}`);
  }
  await typeLine(ctx, session, "end");

  const result = await waitForMarker(ctx, session, tag, ["DONE", "HASH", "ERR"], remaining());
  const elapsedMs = ctx.clock.now() - startedAt;
  await restoreScreen(ctx, session);
  if (result.marker.kind !== "DONE") {
    throw failureForMarker(result.marker, remotePath);
  }
  if (result.marker.detail !== String(payload.size)) {
    throw runtimeFailure(
      `Remote helper reported ${result.marker.detail} bytes written, expected ${payload.size}`
    );
  }

  ctx.note(`Remote hash verified in ${formatSeconds(elapsedMs)}`);
  return { remotePath, size: payload.size, chunks: payload.count, elapsedMs };
};
