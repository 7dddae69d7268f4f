import fs from "fs";
import path from "path";
import readline from "readline";

export interface FileManifest {
  annotationFiles: string[];
  summaryFiles: string[];
  combinedFiles: string[];
  plotFiles: string[];
}

export type FileCategory = keyof FileManifest;

export interface ScanOptions {
  /** Called for each directory that could not be read; the walk continues past it. */
  onSkip?: (dirPath: string, err: unknown) => void;
}

const PLOT_EXTENSIONS = new Set([".png", ".pdf", ".svg"]);

export function emptyManifest(): FileManifest {
  return { annotationFiles: [], summaryFiles: [], combinedFiles: [], plotFiles: [] };
}

export function manifestFileCount(m: FileManifest): number {
  return m.annotationFiles.length + m.summaryFiles.length + m.combinedFiles.length + m.plotFiles.length;
}

export function categorizeFile(fileName: string): FileCategory | null {
  const ext = path.extname(fileName);
  if (ext === ".tsv") {
    if (fileName.includes("summary")) return "summaryFiles";
    if (fileName.includes("combined")) return "combinedFiles";
    return "annotationFiles";
  }
  if (PLOT_EXTENSIONS.has(ext)) return "plotFiles";
  return null;
}

function readEntries(dir: string, options: ScanOptions) {
  try {
    return fs.readdirSync(dir, { withFileTypes: true });
  } catch (err) {
    options.onSkip?.(dir, err);
    return [];
  }
}

function walk(dir: string, relDir: string, manifest: FileManifest, options: ScanOptions): void {
  const entries = readEntries(dir, options).sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  for (const entry of entries) {
    const relPath = relDir ? `${relDir}/${entry.name}` : entry.name;
    if (entry.isDirectory()) {
      walk(path.join(dir, entry.name), relPath, manifest, options);
    } else if (entry.isFile()) {
      const category = categorizeFile(entry.name);
      if (category) manifest[category].push(relPath);
    }
  }
}

/**
 * Partitions the files under `outputDirectory` by category. Paths are relative to the
 * directory and use `/`. A missing directory yields an empty manifest; symbolic links are not
 * followed.
 */
export function scanOutputDirectory(outputDirectory: string, options: ScanOptions = {}): FileManifest {
  const manifest = emptyManifest();
  const root = path.resolve(outputDirectory);
  let isDir = false;
  try {
    isDir = fs.statSync(root, { throwIfNoEntry: false })?.isDirectory() ?? false;
  } catch (err) {
    options.onSkip?.(root, err);
  }
  if (isDir) walk(root, "", manifest, options);
  return manifest;
}

export function filterManifest(m: FileManifest, predicate: (relPath: string) => boolean): FileManifest {
  return {
    annotationFiles: m.annotationFiles.filter(predicate),
    summaryFiles: m.summaryFiles.filter(predicate),
    combinedFiles: m.combinedFiles.filter(predicate),
    plotFiles: m.plotFiles.filter(predicate)
  };
}

export interface TablePreview {
  header: string[];
  rows: string[][];
  /** More data rows follow the ones returned. */
  truncated: boolean;
}

/** Reads only as far as the header, `maxRows` data rows and one line beyond. */
export async function readTablePreview(filePath: string, maxRows = 5): Promise<TablePreview> {
  const input = fs.createReadStream(filePath, { encoding: "utf8" });
  const rl = readline.createInterface({ input, crlfDelay: Infinity });
  let header: string[] | null = null;
  const rows: string[][] = [];
  let truncated = false;
  try {
    for await (const line of rl) {
      if (line.length === 0) continue;
      if (header === null) {
        header = line.split("\t");
      } else if (rows.length < maxRows) {
        rows.push(line.split("\t"));
      } else {
        truncated = true;
        break;
      }
    }
  } finally {
    rl.close();
    input.destroy();
  }
  return { header: header ?? [], rows, truncated };
}
