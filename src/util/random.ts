import crypto from "node:crypto";

/** Short hex tag that keeps one transfer's markers apart from any other output. */
export const randomTag = (bytes = 4): string => crypto.randomBytes(bytes).toString("hex");
