import fs from "node:fs";
import path from "node:path";
import { ConfigurationError } from "./errors";

function walk(root: string, dir: string, extensions: Set<string>, out: string[]): void {
  for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
    const full = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      walk(root, full, extensions, out);
    } else if (entry.isFile() && extensions.has(path.extname(entry.name).toLowerCase())) {
      out.push(path.relative(root, full).split(path.sep).join("/"));
    }
  }
}

/**
 * Lists the images under `folder`, recursively, as `/`-separated paths
 * relative to it. Sorted by code unit so the order only depends on the
 * folder contents.
 */
export function listImages(folder: string, extensions: readonly string[]): string[] {
  let stat: fs.Stats;
  try {
    stat = fs.statSync(folder);
  } catch (err) {
    throw new ConfigurationError(`Images folder ${folder} does not exist`, { cause: err });
  }
  if (!stat.isDirectory()) {
    throw new ConfigurationError(`Images folder ${folder} is not a directory`);
  }

  const images: string[] = [];
  walk(folder, folder, new Set(extensions.map((ext) => ext.toLowerCase())), images);
  if (images.length === 0) {
    throw new ConfigurationError(
      `No images (${extensions.join(", ")}) found in ${folder}`,
    );
  }
  return images.sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
}

export function hasAllowedExtension(imagePath: string, extensions: readonly string[]): boolean {
  return extensions.includes(path.extname(imagePath).toLowerCase());
}
