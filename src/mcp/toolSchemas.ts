import * as z from "zod/v4";
import { MAX_TIMEOUT_SECONDS } from "../config/config.js";

export const PLOT_FORMATS = ["png", "pdf", "svg"] as const;
export type PlotFormat = (typeof PLOT_FORMATS)[number];

export const zPlotFormat = z.enum(PLOT_FORMATS);

export const zAnnotateGenomicRegionsInput = z.object({
  input_files: z
    .union([z.string(), z.array(z.string())])
    .describe("Single BED file path, comma-separated list, or array of file paths"),
  genome_build: z.string().min(1).describe("Target genome build (hg19, hg38, mm9, mm10, dm3, dm6, rn4, rn5, rn6)"),
  output_directory: z.string().min(1).describe("Output directory path"),
  sample_name: z.string().min(1).optional().describe("Sample name used in output file names"),
  include_cpg: z.boolean().default(true).describe("Include CpG island annotations"),
  include_genic: z.boolean().default(true).describe("Include genic feature annotations"),
  plot_formats: z.array(zPlotFormat).min(1).default(["png", "pdf"]).describe("Output plot formats"),
  combine_analysis: z.boolean().default(false).describe("Create combined analysis for multiple files"),
  pattern: z.string().min(1).optional().describe("File match pattern when an input is a directory (default *.bed)"),
  timeout: z.number().int().positive().max(MAX_TIMEOUT_SECONDS).optional().describe("Execution timeout in seconds (default 300)")
});

export const zListSupportedGenomesInput = z.object({});

export const zValidateBedFormatInput = z.object({
  file_path: z.string().min(1).describe("Path to BED file to validate")
});

export const zGetAnnotationSummaryInput = z.object({
  results_directory: z.string().min(1).describe("Path to annotation results directory"),
  sample_name: z.string().min(1).optional().describe("Only report files whose names contain this sample name"),
  max_preview_rows: z.number().int().min(1).max(50).default(5).describe("Rows of the first summary table to preview")
});
