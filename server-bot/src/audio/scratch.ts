import fs from "node:fs/promises";
import path from "node:path";

export type ScratchDir = {
  readonly path: string;
  release(): Promise<void>;
};

/** A private temp directory for one request; release() is idempotent. */
export async function createScratchDir(root: string, prefix = "voicebot-"): Promise<ScratchDir> {
  await fs.mkdir(root, { recursive: true });
  const dir = await fs.mkdtemp(path.join(root, prefix));
  let released: Promise<void> | null = null;
  return {
    path: dir,
    release() {
      released ??= fs.rm(dir, { recursive: true, force: true });
      return released;
    }
  };
}
