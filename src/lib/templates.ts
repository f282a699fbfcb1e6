import { Eta } from "eta";
import { fileURLToPath } from "node:url";
import { dirname, join } from "node:path";

/** Root `templates/` directory, the same from `src/lib` and `dist/lib`. */
export const TEMPLATES_DIR = join(dirname(fileURLToPath(import.meta.url)), "../../templates");

export type TemplateName = "geometry-table";

const eta = new Eta({
  views: TEMPLATES_DIR,
  // headings carry <sub> markup
  autoEscape: false,
});

export function render(template: TemplateName, data: object): string {
  return eta.render(template, data);
}
