import fs from "fs";
import path from "path";

export interface WorkspaceHooks {
  /** Runs after the body settles, before the directory is removed. */
  onCleanup?: (dir: string) => void;
  onRemoved?: (dir: string) => void;
}

/**
 * Run `body` inside a fresh private directory under `root` and remove that
 * directory recursively however `body` exits.
 */
export async function withWorkspace<T>(
  root: string,
  body: (dir: string) => Promise<T>,
  hooks: WorkspaceHooks = {},
): Promise<T> {
  await fs.promises.mkdir(root, { recursive: true });
  const dir = await fs.promises.mkdtemp(path.join(root, "transfer-"));

  try {
    return await body(dir);
  } finally {
    hooks.onCleanup?.(dir);
    await fs.promises.rm(dir, { recursive: true, force: true });
    hooks.onRemoved?.(dir);
  }
}
