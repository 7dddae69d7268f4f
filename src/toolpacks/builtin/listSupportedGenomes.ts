import { zListSupportedGenomesInput } from "../../mcp/toolSchemas.js";
import { defineTool, textResponse } from "../types.js";

export const listSupportedGenomesTool = defineTool({
  toolName: "list_supported_genomes",
  description: "List all supported genome builds and their details",
  inputSchema: zListSupportedGenomesInput,

  async run(_args, ctx) {
    const genomes = ctx.genomes.list();
    const blocks = genomes.map((g) =>
      [
        `**${g.id}**: ${g.description}`,
        `  - Species: ${g.species}`,
        `  - Assembly: ${g.assembly}`,
        `  - Chromosome style: ${g.chromosomeStyle}`,
        `  - Annotations: ${g.annotations.join(", ")}`
      ].join("\n")
    );

    const text = [
      "Supported Genome Builds",
      "",
      blocks.join("\n\n"),
      "",
      "Use any of these ids as `genome_build` when calling `annotate_genomic_regions`."
    ].join("\n");

    return textResponse(text, {
      genomes: genomes.map((g) => ({
        id: g.id,
        description: g.description,
        species: g.species,
        assembly: g.assembly,
        chromosome_style: g.chromosomeStyle,
        annotations: [...g.annotations]
      }))
    });
  }
});
