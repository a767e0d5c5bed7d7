import fs from "node:fs/promises";
import path from "node:path";
import fg from "fast-glob";
import type { RawDocument } from "@profile-rag/types";
import { errorMessage } from "@profile-rag/errors";
import type { Logger } from "@profile-rag/logger";
import type { ExtractorRegistry } from "./registry.js";

const DEFAULT_IGNORED_DIRS = ["node_modules", ".git", "dist", "build", "__pycache__", ".venv"];

export interface LoadDirectoryOptions {
  registry: ExtractorRegistry;
  logger: Logger;
  /** Directory names pruned anywhere in the tree. */
  ignoredDirs?: string[];
  /** Files extracted in parallel. Output order does not depend on it. */
  concurrency?: number;
}

/**
 * Walk `root` recursively and extract every file with a registered extension.
 *
 * Never throws for filesystem or extractor problems: a missing root yields `[]`
 * with a warning, and a file that fails to extract is logged and skipped.
 */
export async function loadDirectory(
  root: string,
  options: LoadDirectoryOptions,
): Promise<RawDocument[]> {
  const { registry } = options;
  const logger = options.logger.child({ sourceDir: root });
  const concurrency = Math.max(1, options.concurrency ?? 4);

  if (!(await isDirectory(root))) {
    logger.warn("Source directory does not exist, skipping");
    return [];
  }

  let files: string[];
  try {
    files = await fg("**/*", {
      cwd: root,
      onlyFiles: true,
      dot: false,
      followSymbolicLinks: false,
      ignore: (options.ignoredDirs ?? DEFAULT_IGNORED_DIRS).map((dir) => `**/${dir}/**`),
    });
  } catch (err) {
    logger.warn({ err: errorMessage(err) }, "Could not walk source directory, skipping");
    return [];
  }
  files.sort();

  const perFile: RawDocument[][] = new Array<RawDocument[]>(files.length);
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < files.length) {
      const index = next++;
      const relative = files[index];
      if (relative === undefined) continue;
      perFile[index] = await loadFile(root, relative, registry, logger);
    }
  };
  await Promise.all(Array.from({ length: Math.min(concurrency, files.length) }, worker));

  const documents = perFile.flat();
  logger.info(
    { files: files.length, documents: documents.length },
    `Loaded ${String(documents.length)} documents from ${root}`,
  );
  return documents;
}

async function loadFile(
  root: string,
  relative: string,
  registry: ExtractorRegistry,
  logger: Logger,
): Promise<RawDocument[]> {
  const filePath = path.join(root, relative);
  const extension = path.extname(relative).toLowerCase();
  const extractor = registry.get(extension);

  if (!extractor) {
    logger.debug({ file: relative }, "No extractor for extension, skipping");
    return [];
  }

  try {
    const units = await extractor.extract(filePath);
    return units.map((unit) => ({
      text: unit.text,
      originPath: filePath,
      metadata: {
        ...unit.metadata,
        source: filePath,
        extension,
        sourceDir: root,
      },
    }));
  } catch (err) {
    logger.error(
      { file: relative, extractor: extractor.name, err: errorMessage(err) },
      "Failed to extract file, skipping",
    );
    return [];
  }
}

async function isDirectory(dir: string): Promise<boolean> {
  try {
    return (await fs.stat(dir)).isDirectory();
  } catch {
    return false;
  }
}
