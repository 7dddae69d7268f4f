import { describe, it, expect } from "vitest";
import { ValidationError } from "../src/core/errors.js";
import { GenomeRegistry } from "../src/genomes/genomeRegistry.js";
import { buildJobSpec, normalizeInputFiles } from "../src/jobs/jobSpec.js";
import { TEST_LIMITS } from "./helpers.js";

const options = { genomes: new GenomeRegistry(), limits: TEST_LIMITS, newId: () => "job_TEST" as const };

function build(args: Record<string, unknown>) {
  return buildJobSpec(args, options);
}

describe("normalizeInputFiles", () => {
  it("accepts a single path", () => {
    expect(normalizeInputFiles("a.bed")).toEqual(["a.bed"]);
  });

  it("splits comma-joined strings and trims", () => {
    expect(normalizeInputFiles(" a.bed, b.bed ,,c.bed ")).toEqual(["a.bed", "b.bed", "c.bed"]);
  });

  it("flattens arrays of paths and comma-joined entries", () => {
    expect(normalizeInputFiles(["a.bed", "b.bed,c.bed", "  "])).toEqual(["a.bed", "b.bed", "c.bed"]);
  });
});

describe("buildJobSpec", () => {
  it("applies defaults", () => {
    const spec = build({ input_files: "regions.bed", genome_build: "hg38", output_directory: "out" });
    expect(spec).toEqual({
      jobId: "job_TEST",
      inputFiles: ["regions.bed"],
      genomeBuild: "hg38",
      outputDirectory: "out",
      includeCpg: true,
      includeGenic: true,
      plotFormats: ["png", "pdf"],
      combineAnalysis: false,
      pattern: "*.bed",
      timeoutSeconds: 300
    });
    expect(spec.sampleName).toBeUndefined();
  });

  it("keeps explicit values", () => {
    const spec = build({
      input_files: ["a.bed", "b.bed"],
      genome_build: "mm10",
      output_directory: "/out",
      sample_name: "liver",
      include_cpg: false,
      plot_formats: ["svg", "png", "svg"],
      combine_analysis: true,
      pattern: "*.narrowPeak",
      timeout: 60
    });
    expect(spec.inputFiles).toEqual(["a.bed", "b.bed"]);
    expect(spec.sampleName).toBe("liver");
    expect(spec.includeCpg).toBe(false);
    expect(spec.plotFormats).toEqual(["svg", "png"]);
    expect(spec.combineAnalysis).toBe(true);
    expect(spec.pattern).toBe("*.narrowPeak");
    expect(spec.timeoutSeconds).toBe(60);
  });

  it("produces a frozen spec", () => {
    const spec = build({ input_files: "a.bed", genome_build: "hg19", output_directory: "out" });
    expect(Object.isFrozen(spec)).toBe(true);
    expect(Object.isFrozen(spec.inputFiles)).toBe(true);
    expect(Object.isFrozen(spec.plotFormats)).toBe(true);
  });

  it("builds a fresh spec per call", () => {
    const args = { input_files: "a.bed", genome_build: "hg19", output_directory: "out" };
    const a = buildJobSpec(args, { genomes: new GenomeRegistry(), limits: TEST_LIMITS });
    const b = buildJobSpec(args, { genomes: new GenomeRegistry(), limits: TEST_LIMITS });
    expect(a).not.toBe(b);
    expect(a.jobId).not.toBe(b.jobId);
    expect(a.jobId).toMatch(/^job_[0-9A-HJKMNP-TV-Z]{26}$/);
  });

  it("rejects an empty file list after normalization", () => {
    for (const input_files of ["", " , ,", [], [" "]]) {
      expect(() => build({ input_files, genome_build: "hg38", output_directory: "out" })).toThrow(
        new ValidationError("input_files must name at least one file")
      );
    }
  });

  it("rejects unsupported genome builds", () => {
    for (const genome_build of ["hg37", "HG38", "mm11", "danRer11"]) {
      let caught: unknown;
      try {
        build({ input_files: "a.bed", genome_build, output_directory: "out" });
      } catch (err) {
        caught = err;
      }
      expect(caught).toBeInstanceOf(ValidationError);
      expect(caught).toMatchObject({
        message: `Unsupported genome build '${genome_build}'. Available: hg19, hg38, mm9, mm10, dm3, dm6, rn4, rn5, rn6`
      });
    }
  });

  it("rejects missing required fields", () => {
    let caught: unknown;
    try {
      build({ input_files: "a.bed" });
    } catch (err) {
      caught = err;
    }
    if (!(caught instanceof ValidationError)) throw new Error("expected a ValidationError");
    const issues = caught.issues;
    expect(issues.some((i) => i.startsWith("genome_build:"))).toBe(true);
    expect(issues.some((i) => i.startsWith("output_directory:"))).toBe(true);
  });

  it("rejects unknown plot formats, empty format lists and bad timeouts", () => {
    const base = { input_files: "a.bed", genome_build: "hg38", output_directory: "out" };
    expect(() => build({ ...base, plot_formats: ["jpg"] })).toThrow(ValidationError);
    expect(() => build({ ...base, plot_formats: [] })).toThrow(ValidationError);
    expect(() => build({ ...base, timeout: 0 })).toThrow(ValidationError);
    expect(() => build({ ...base, timeout: 1.5 })).toThrow(ValidationError);
    expect(() => build({ ...base, timeout: 3601 })).toThrow(
      new ValidationError("timeout 3601s exceeds the maximum of 3600s")
    );
  });

  it("rejects timeouts a timer cannot hold, whatever the configured maximum", () => {
    const generous = { ...options, limits: { ...TEST_LIMITS, maxTimeoutSeconds: 10_000_000 } };
    const base = { input_files: "a.bed", genome_build: "hg38", output_directory: "out" };
    expect(buildJobSpec({ ...base, timeout: 2_147_483 }, generous).timeoutSeconds).toBe(2_147_483);
    expect(() => buildJobSpec({ ...base, timeout: 3_000_000 }, generous)).toThrow(/^invalid arguments: timeout: /);
  });

  it("rejects annotation kinds the genome does not provide", () => {
    const genomes = new GenomeRegistry([
      { id: "xx1", description: "T", species: "T", assembly: "T", chromosomeStyle: "chr1", annotations: ["genic"] }
    ]);
    const args = { input_files: "a.bed", genome_build: "xx1", output_directory: "out" };
    expect(() => buildJobSpec(args, { genomes, limits: TEST_LIMITS })).toThrow(
      new ValidationError("genome build xx1 has no CpG annotations")
    );
    expect(buildJobSpec({ ...args, include_cpg: false }, { genomes, limits: TEST_LIMITS }).includeGenic).toBe(true);
  });
});
