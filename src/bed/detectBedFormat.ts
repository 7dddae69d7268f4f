import { promises as fs } from "fs";

export type BedFormat = "BED3" | "BED6" | "BED12" | "UNKNOWN";

export interface BedInspection {
  format: BedFormat;
  columns: number;
  dataLines: number;
  preview: string[];
}

function isDataLine(line: string): boolean {
  const t = line.trim();
  return t.length > 0 && !t.startsWith("#") && !t.startsWith("track") && !t.startsWith("browser");
}

export function bedFormatForColumns(columns: number): BedFormat {
  if (columns >= 12) return "BED12";
  if (columns >= 6) return "BED6";
  if (columns >= 3) return "BED3";
  return "UNKNOWN";
}

/** Classifies by the column count of the first data line. */
export function detectBedFormat(text: string): BedFormat {
  const first = text.split(/\r?\n/).find(isDataLine);
  if (first === undefined) return "UNKNOWN";
  return bedFormatForColumns(first.trim().split("\t").length);
}

export async function inspectBedFile(filePath: string, previewLines = 5): Promise<BedInspection> {
  const text = await fs.readFile(filePath, "utf8");
  const lines = text.split(/\r?\n/).filter(isDataLine);
  const columns = lines[0]?.trim().split("\t").length ?? 0;
  return {
    format: bedFormatForColumns(columns),
    columns,
    dataLines: lines.length,
    preview: lines.slice(0, previewLines).map((l) => l.trimEnd())
  };
}
