import { Command, Flags } from "@oclif/core";
import chalk from "chalk";
import { Output } from "../lib/output.js";
import { defaultGeometryTable } from "../lib/geometry/registry.js";
import type { BoltGeometry } from "../lib/geometry/bolt-geometry.js";
import { GEOMETRY_PARAMETERS } from "../lib/catalog/lookup-tables.js";
import { renderCell } from "../lib/catalog/table.js";
import { formatErrorChain } from "../lib/errors.js";
import { formatFixed } from "../lib/formatting.js";

function geometryLines(g: BoltGeometry): string[] {
  const width = Math.max(...GEOMETRY_PARAMETERS.map((p) => p.key.length));
  return [
    ...GEOMETRY_PARAMETERS.map((p) => `  ${p.key.padEnd(width)}  ${renderCell(p.value(g))}`),
    `  ${"C".padEnd(width)}  ${formatFixed(g.C, 4)}`,
    `  ${"beta".padEnd(width)}  ${formatFixed(g.beta, 4)}°`,
    `  ${"dgl".padEnd(width)}  ${g.dgl}`,
    `  ${"cls".padEnd(width)}  ${g.cls.join(", ")}`,
  ];
}

export default class Geometry extends Command {
  static description = "Print the ISO metric bolt geometry table, or one entry of it";

  static examples = ["<%= config.bin %> geometry", "<%= config.bin %> geometry --diameter 12"];

  static flags = {
    diameter: Flags.integer({
      char: "D",
      description: "Nominal diameter in millimeters",
    }),
  };

  async run(): Promise<void> {
    const { flags } = await this.parse(Geometry);
    const out = new Output({ verbose: false });

    const table = defaultGeometryTable();
    let geometries: readonly BoltGeometry[];
    try {
      geometries = table.getBoltGeometries();
    } catch (error) {
      out.error(formatErrorChain(error));
      return this.exit(1);
    }

    if (flags.diameter === undefined) {
      for (const g of geometries) {
        console.log(
          `${chalk.cyan(`M${g.D}`.padEnd(4))}  P=${g.P}  s=${g.s}  k=${g.k}  dgl=${g.dgl}  ` +
            `beta=${formatFixed(g.beta, 4)}°  lengths=${g.cls.length}`
        );
      }
      return;
    }

    const lookup = table.get(flags.diameter);
    if (!lookup.ok) {
      out.error(lookup.error.message);
      out.warn(`Registered diameters: ${table.diameters().join(", ")}`);
      return this.exit(1);
    }
    out.header(`M${lookup.geometry.D}`);
    for (const line of geometryLines(lookup.geometry)) {
      console.log(line);
    }
  }
}
