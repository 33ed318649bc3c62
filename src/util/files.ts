import fs from "node:fs/promises";
import path from "node:path";
import { randomTag } from "./random.js";

export const pathExists = async (target: string): Promise<boolean> => {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
};

export const isDirectory = async (target: string): Promise<boolean> => {
  try {
    return (await fs.stat(target)).isDirectory();
  } catch {
    return false;
  }
};

export const isExecutable = async (target: string): Promise<boolean> => {
  try {
    await fs.access(target, fs.constants.X_OK);
    return !(await isDirectory(target));
  } catch {
    return false;
  }
};

/** Writes beside the target and renames over it, so readers see the old file or the new one. */
export const writeFileAtomic = async (target: string, data: Buffer): Promise<void> => {
  const temporary = path.join(
    path.dirname(target),
    `.${path.basename(target)}.termhand-${randomTag()}`
  );
  try {
    await fs.writeFile(temporary, data);
    await fs.rename(temporary, target);
  } catch (error) {
    await fs.rm(temporary, { force: true });
    throw error;
  }
};
