import { BUILTIN_GENOMES } from "./builtinGenomes.js";

export type AnnotationKind = "cpg" | "genic";

export interface GenomeEntry {
  id: string;
  description: string;
  species: string;
  assembly: string;
  chromosomeStyle: string;
  annotations: readonly AnnotationKind[];
}

export class GenomeRegistry {
  private readonly byId: ReadonlyMap<string, GenomeEntry>;

  constructor(entries: readonly GenomeEntry[] = BUILTIN_GENOMES) {
    const byId = new Map<string, GenomeEntry>();
    for (const entry of entries) {
      if (byId.has(entry.id)) throw new Error(`duplicate genome id: ${entry.id}`);
      byId.set(entry.id, Object.freeze({ ...entry, annotations: Object.freeze([...entry.annotations]) }));
    }
    this.byId = byId;
  }

  get(id: string): GenomeEntry | null {
    return this.byId.get(id) ?? null;
  }

  has(id: string): boolean {
    return this.byId.has(id);
  }

  ids(): string[] {
    return [...this.byId.keys()];
  }

  list(): GenomeEntry[] {
    return [...this.byId.values()];
  }

  supports(id: string, kind: AnnotationKind): boolean {
    return this.get(id)?.annotations.includes(kind) ?? false;
  }
}
