import { NameCodecError } from "../errors.js";

export const DEFAULT_NAME_PREFIX = "MBolt";

const DELIMITER = " - ";

export type CategoryDecode =
  | { ok: true; category: string }
  | { ok: false; reason: string };

export type ArtifactDecode =
  | { ok: true; category: string; diameter: number }
  | { ok: false; reason: string };

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Maps (category, diameter) pairs to material names and back.
 *
 *   encode("Steel galvanized", 12)      -> "MBolt - Steel galvanized - M12 thread"
 *   encodeTemplate("Steel galvanized")  -> "MBolt - Steel galvanized - Thread template"
 *   encodePlain("Steel galvanized")     -> "MBolt - Steel galvanized"
 */
export class NameCodec {
  readonly templatePattern: RegExp;
  readonly artifactPattern: RegExp;

  constructor(readonly prefix: string = DEFAULT_NAME_PREFIX) {
    if (prefix.trim() === "" || prefix.includes(DELIMITER)) {
      throw new NameCodecError(`Invalid name prefix "${prefix}"`);
    }
    const p = escapeRegExp(prefix);
    this.templatePattern = new RegExp(`^${p} - (.+) - Thread template$`, "s");
    this.artifactPattern = new RegExp(`^${p} - (.+) - M(\\d+) thread$`, "s");
  }

  encode(category: string, diameter: number): string {
    this.checkCategory(category);
    if (!Number.isInteger(diameter) || diameter <= 0) {
      throw new NameCodecError(`Invalid nominal diameter ${diameter}`);
    }
    return `${this.prefix}${DELIMITER}${category}${DELIMITER}M${diameter} thread`;
  }

  encodeTemplate(category: string): string {
    this.checkCategory(category);
    return `${this.prefix}${DELIMITER}${category}${DELIMITER}Thread template`;
  }

  encodePlain(category: string): string {
    this.checkCategory(category);
    return `${this.prefix}${DELIMITER}${category}`;
  }

  decodeCategory(templateName: string): CategoryDecode {
    const match = this.templatePattern.exec(templateName);
    if (!match || categoryProblem(match[1]) !== undefined) {
      return { ok: false, reason: `"${templateName}" is not a template name` };
    }
    return { ok: true, category: match[1] };
  }

  decodeArtifact(name: string): ArtifactDecode {
    const match = this.artifactPattern.exec(name);
    if (!match || categoryProblem(match[1]) !== undefined) {
      return { ok: false, reason: `"${name}" is not a thread material name` };
    }
    return { ok: true, category: match[1], diameter: Number(match[2]) };
  }

  isTemplateName(name: string): boolean {
    return this.decodeCategory(name).ok;
  }

  isArtifactName(name: string): boolean {
    return this.decodeArtifact(name).ok;
  }

  private checkCategory(category: string): void {
    const problem = categoryProblem(category);
    if (problem !== undefined) {
      throw new NameCodecError(problem);
    }
  }
}

/** Encoding and decoding accept exactly the same categories. */
function categoryProblem(category: string): string | undefined {
  if (category.trim() === "") {
    return "Category must not be empty";
  }
  if (category.includes(DELIMITER)) {
    return `Category "${category}" must not contain "${DELIMITER}"`;
  }
  return undefined;
}
