import type { GenomeEntry } from "./genomeRegistry.js";

export const BUILTIN_GENOMES: readonly GenomeEntry[] = [
  {
    id: "hg19",
    description: "Human (GRCh37)",
    species: "Homo sapiens",
    assembly: "GRCh37",
    chromosomeStyle: "chr1",
    annotations: ["cpg", "genic"]
  },
  {
    id: "hg38",
    description: "Human (GRCh38)",
    species: "Homo sapiens",
    assembly: "GRCh38",
    chromosomeStyle: "chr1",
    annotations: ["cpg", "genic"]
  },
  {
    id: "mm9",
    description: "Mouse (NCBI37)",
    species: "Mus musculus",
    assembly: "NCBI37",
    chromosomeStyle: "chr1",
    annotations: ["cpg", "genic"]
  },
  {
    id: "mm10",
    description: "Mouse (GRCm38)",
    species: "Mus musculus",
    assembly: "GRCm38",
    chromosomeStyle: "chr1",
    annotations: ["cpg", "genic"]
  },
  {
    id: "dm3",
    description: "Drosophila (BDGP Release 5)",
    species: "Drosophila melanogaster",
    assembly: "BDGP Release 5",
    chromosomeStyle: "chr2L",
    annotations: ["cpg", "genic"]
  },
  {
    id: "dm6",
    description: "Drosophila (BDGP Release 6)",
    species: "Drosophila melanogaster",
    assembly: "BDGP Release 6",
    chromosomeStyle: "chr2L",
    annotations: ["cpg", "genic"]
  },
  {
    id: "rn4",
    description: "Rat (RGSC 3.4)",
    species: "Rattus norvegicus",
    assembly: "RGSC 3.4",
    chromosomeStyle: "chr1",
    annotations: ["cpg", "genic"]
  },
  {
    id: "rn5",
    description: "Rat (RGSC 5.0)",
    species: "Rattus norvegicus",
    assembly: "RGSC 5.0",
    chromosomeStyle: "chr1",
    annotations: ["cpg", "genic"]
  },
  {
    id: "rn6",
    description: "Rat (RGSC 6.0)",
    species: "Rattus norvegicus",
    assembly: "RGSC 6.0",
    chromosomeStyle: "chr1",
    annotations: ["cpg", "genic"]
  }
];
