import type { BoltGeometry } from "../geometry/bolt-geometry.js";
import { render } from "../templates.js";
import { renderCell } from "./table.js";
import { GEOMETRY_PARAMETERS, geometryParameterRows } from "./lookup-tables.js";

/**
 * Geometry parameters as an HTML table, same columns as the delimited parameter table.
 */
export function renderGeometryHtml(geometries: readonly BoltGeometry[]): string {
  const rows = geometryParameterRows(geometries).map((row) => ({
    name: row.name,
    values: row.cells.map(renderCell),
  }));
  return render("geometry-table", {
    headings: GEOMETRY_PARAMETERS.map((p) => p.html),
    rows,
  });
}
