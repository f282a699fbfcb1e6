import type { NameCodec } from "../naming/name-codec.js";
import { findBumpGradientMap } from "../store/assets.js";
import type { MaterialRecord } from "../store/types.js";

export type TemplateValidation =
  | { ok: true; category: string; trace: string[] }
  | { ok: false; reason: string; trace: string[] };

const OK = " -> OK";
const FAILED = " -> FAILED";

/**
 * Checks that a material can serve as the template for derived thread materials.
 * Checks run in order and stop at the first failure; nothing is mutated.
 */
export class TemplateValidator {
  constructor(private readonly codec: NameCodec) {}

  validate(template: MaterialRecord | null | undefined): TemplateValidation {
    const trace: string[] = [];
    const fail = (reason: string, line: string): TemplateValidation => {
      trace.push(`  ${line}${FAILED}`);
      return { ok: false, reason, trace };
    };

    if (!template) {
      trace.push(`Material <null>${FAILED}`);
      return { ok: false, reason: "Material is absent", trace };
    }

    const label = `Material "${template.name}"`;
    trace.push(label);

    if (!template.document) {
      return fail(`${label} does not reside in a document`, "Material does not reside in a document");
    }
    trace.push(`  Material resides in document "${template.document}"${OK}`);

    const expected = `${this.codec.prefix} - <plain material name> - Thread template`;
    const decoded = this.codec.decodeCategory(template.name);
    if (!decoded.ok) {
      return fail(
        `${label} has an invalid name, should be "${expected}"`,
        `Material has an invalid name, should be "${expected}"`
      );
    }
    trace.push(`  Material name matches "${expected}"${OK}`);

    if (!template.appearance) {
      return fail(`${label} has no appearance asset`, "Material has no appearance asset");
    }
    trace.push(`  Material has an appearance asset${OK}`);

    if (!findBumpGradientMap(template.appearance)) {
      return fail(
        `${label}: appearance asset has no bump gradient map`,
        "Appearance asset has no bump gradient map"
      );
    }
    trace.push(`  Appearance asset has a bump gradient map${OK}`);

    return { ok: true, category: decoded.category, trace };
  }
}
