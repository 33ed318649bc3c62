import { invalidInput } from "../errors.js";

export const withoutTmuxEnv = (
  env: NodeJS.ProcessEnv = process.env
): NodeJS.ProcessEnv => {
  const next = { ...env };
  delete next.TMUX;
  delete next.TMUX_PANE;
  return next;
};

const ENV_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

/** Parses repeated `-e KEY=VALUE` flags; later entries win. */
export const parseEnvAssignments = (entries: readonly string[]): Record<string, string> => {
  const output: Record<string, string> = {};
  for (const entry of entries) {
    const separator = entry.indexOf("=");
    const key = separator > 0 ? entry.slice(0, separator) : "";
    if (!ENV_NAME.test(key)) {
      throw invalidInput(`Invalid environment entry '${entry}': must be KEY=VALUE`);
    }
    output[key] = entry.slice(separator + 1);
  }
  return output;
};
