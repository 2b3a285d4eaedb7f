import { mkdir } from "node:fs/promises";
import path from "node:path";
import { VECTORIZE_CONFIG } from "./config.js";
import { io } from "./errors.js";
import type { StagingPaths } from "./types.js";

export function stagingPaths(root: string, domain: string): StagingPaths {
  if (!domain || domain === "." || domain === ".." || /[\\/]/.test(domain)) {
    throw new RangeError(`Invalid domain name: "${domain}"`);
  }
  const dir = path.join(root, VECTORIZE_CONFIG.stagingDirName, domain);
  return {
    dir,
    vectors: path.join(dir, VECTORIZE_CONFIG.vectorsFileName),
    progress: path.join(dir, VECTORIZE_CONFIG.progressFileName),
  };
}

export async function prepareStaging(root: string, domain: string): Promise<StagingPaths> {
  const paths = stagingPaths(root, domain);
  await io("mkdir", paths.dir, () => mkdir(paths.dir, { recursive: true }));
  return paths;
}
