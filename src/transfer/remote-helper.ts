import fs from "node:fs/promises";
import { fileURLToPath } from "node:url";
import { shellQuote } from "../util/shell-quote.js";

const HELPER_PATH = fileURLToPath(new URL("../../assets/remote-helper.py", import.meta.url));

let cachedSource: Promise<string> | undefined;

export const loadHelperSource = (): Promise<string> => {
  cachedSource ??= fs.readFile(HELPER_PATH, "utf8");
  return cachedSource;
};

/**
 * One shell line that runs the helper with whichever Python the remote has.
 * The script travels base64-encoded and the fallback marker is split by
 * quotes, so the echoed command never contains a marker of its own.
 */
export const buildHelperCommand = (source: string, tag: string, args: readonly string[]): string => {
  const encoded = Buffer.from(source, "utf8").toString("base64");
  const quotedArgs = args.map((arg) => shellQuote(arg)).join(" ");
  return (
    ` P=$(command -v python3 || command -v python) && "$P" -c ` +
    `"import base64;exec(base64.b64decode('${encoded}'))" ${quotedArgs} || echo TH"_NOPY_"${tag}`
  );
};
