import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";

import { setupLogs } from "./logging.ts";

/** Keeps test output readable; call once at the top of a test file */
export function quietLogs() {
  setupLogs({ logLevel: 'silent', logFormat: 'json' });
}

/** Creates a scratch directory holding the given files, keyed by relative path */
export async function makeTree(files: Record<string, string>) {
  const root = await mkdtemp(join(tmpdir(), 'zone-compiler-'));
  await writeTree(root, files);
  return root;
}

export async function writeTree(root: string, files: Record<string, string>) {
  for (const [relative, contents] of Object.entries(files)) {
    const path = join(root, relative);
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, contents, 'utf-8');
  }
}

export async function removeTree(root: string) {
  await rm(root, { recursive: true, force: true });
}
