import { readFile, writeFile, mkdir, readdir, rename, rm } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { ManifestError } from "./errors.js";
import type { Manifest } from "./types.js";

const manifestSchema = z.record(z.string(), z.string());

export interface MergeResult {
  manifest: Manifest;
  /** Filenames whose URL differed from the stored one and were left untouched. */
  conflicts: string[];
}

export class ManifestStore {
  constructor(readonly manifestPath: string) {}

  async load(): Promise<Manifest> {
    let data: string;
    try {
      data = await readFile(this.manifestPath, "utf-8");
    } catch (err) {
      if (isMissing(err)) return {};
      throw new ManifestError(`Failed to read manifest at ${this.manifestPath}`, { cause: err });
    }

    let json: unknown;
    try {
      json = JSON.parse(data);
    } catch (err) {
      throw new ManifestError(`Manifest at ${this.manifestPath} is not valid JSON`, { cause: err });
    }

    const parsed = manifestSchema.safeParse(json);
    if (!parsed.success) {
      throw new ManifestError(
        `Manifest at ${this.manifestPath} must map filenames to URL strings`,
        { cause: parsed.error },
      );
    }
    return parsed.data;
  }

  /** Writes beside the target and renames over it so readers never see a partial file. */
  async save(manifest: Manifest): Promise<void> {
    const dir = path.dirname(this.manifestPath);
    await mkdir(dir, { recursive: true });
    const tmpPath = path.join(
      dir,
      `.${path.basename(this.manifestPath)}.${process.pid}.${Date.now()}.tmp`,
    );
    try {
      await writeFile(tmpPath, JSON.stringify(manifest, null, 2) + "\n", "utf-8");
      await rename(tmpPath, this.manifestPath);
    } catch (err) {
      await rm(tmpPath, { force: true });
      throw new ManifestError(`Failed to write manifest at ${this.manifestPath}`, { cause: err });
    }
  }
}

export function mergeManifest(
  existing: Manifest,
  additions: Manifest,
  options: { overwrite?: boolean } = {},
): MergeResult {
  const manifest: Manifest = { ...existing };
  const conflicts: string[] = [];
  for (const [filename, url] of Object.entries(additions)) {
    const current = manifest[filename];
    if (current !== undefined && current !== url && !options.overwrite) {
      conflicts.push(filename);
      continue;
    }
    manifest[filename] = url;
  }
  return { manifest, conflicts };
}

export async function listLocalPdfs(pdfDir: string): Promise<string[]> {
  try {
    const entries = await readdir(pdfDir);
    return entries
      .filter((f) => f.toLowerCase().endsWith(".pdf"))
      .sort()
      .map((f) => path.join(pdfDir, f));
  } catch (err) {
    // directory doesn't exist yet — no files
    if (isMissing(err)) return [];
    throw err;
  }
}

function isMissing(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
