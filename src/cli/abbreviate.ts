import { invalidInput } from "../errors.js";

// Global flags that take a separate value, so their value is not mistaken for the command.
const FLAGS_WITH_VALUE = new Set(["-L", "-S", "--socket-name", "--socket-path", "--debug-log"]);

/**
 * Expands a unique command prefix (`stat` to `status`). Exact names always
 * win, so `wait` stays `wait` even though `wait-for` shares the prefix.
 */
export const expandCommandPrefix = (argv: readonly string[], commands: readonly string[]): string[] => {
  const expanded = [...argv];
  for (let index = 0; index < expanded.length; index += 1) {
    const token = expanded[index];
    if (token === "--") {
      break;
    }
    if (token.startsWith("-")) {
      if (FLAGS_WITH_VALUE.has(token)) {
        index += 1;
      }
      continue;
    }
    if (commands.includes(token)) {
      return expanded;
    }
    const matches = commands.filter((command) => command.startsWith(token));
    if (matches.length > 1) {
      throw invalidInput(`Ambiguous command '${token}': could be ${matches.join(", ")}`);
    }
    if (matches.length === 1) {
      expanded[index] = matches[0];
    }
    return expanded;
  }
  return expanded;
};
