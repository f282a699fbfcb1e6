import type { BoltGeometry } from "../geometry/bolt-geometry.js";
import type { NameCodec } from "../naming/name-codec.js";
import { StoreOperationError } from "../errors.js";
import { findBumpGradientMap, findPropertyOfKind, type PropertyOfKind } from "./assets.js";
import type {
  ArtifactStore,
  Asset,
  AssetPropertyKind,
  MaterialDocument,
  MaterialRecord,
  TransactionScope,
} from "./types.js";

const MM_PER_INCH = 25.4;

export interface DocumentStoreOptions {
  codec: NameCodec;
  /** Written to the manufacturer parameter of created materials */
  author: string;
  repositoryUrl: string;
}

function requireProperty<K extends AssetPropertyKind>(
  asset: Asset,
  name: string,
  kind: K
): PropertyOfKind<K> {
  const property = findPropertyOfKind(asset, name, kind);
  if (!property) {
    throw new StoreOperationError(`Asset "${asset.name}" has no ${kind} property "${name}"`);
  }
  return property;
}

/**
 * Material store over an in-memory material document.
 * Mutations are only accepted inside run(); a failing body restores the document.
 */
export class DocumentStore implements ArtifactStore, TransactionScope {
  private transaction: string | null = null;
  private dirty = false;
  private readonly committed: string[] = [];

  constructor(
    private readonly doc: MaterialDocument,
    private readonly options: DocumentStoreOptions
  ) {}

  get document(): MaterialDocument {
    return this.doc;
  }

  /** True once a transaction has been committed */
  get isDirty(): boolean {
    return this.dirty;
  }

  /** Names of committed transactions, oldest first */
  get transactions(): readonly string[] {
    return this.committed;
  }

  find(filter: string | RegExp): MaterialRecord[] {
    if (typeof filter === "string") {
      return this.doc.materials.filter((m) => m.name === filter);
    }
    return this.doc.materials.filter((m) => filter.test(m.name));
  }

  create(template: MaterialRecord, name: string, geometry: BoltGeometry): MaterialRecord {
    this.assertTransaction(`create "${name}"`);
    if (this.find(name).length > 0) {
      throw new StoreOperationError(`Material "${name}" already exists`);
    }
    const decoded = this.options.codec.decodeCategory(template.name);
    if (!decoded.ok) {
      throw new StoreOperationError(decoded.reason);
    }
    if (!template.appearance) {
      throw new StoreOperationError(`Material "${template.name}" has no appearance asset`);
    }

    const description = `Generic ISO metric bolt assembly: ${decoded.category} with M${geometry.D} thread`;
    const { repositoryUrl } = this.options;
    const comments =
      `Rendering material for M${geometry.D} thread. Use "isobolt materials" to manage thread materials.` +
      (repositoryUrl ? ` See ${repositoryUrl} for further instructions.` : "");

    const appearance = structuredClone(template.appearance);
    appearance.name = name;
    const keyword = requireProperty(appearance, "keyword", "string");
    keyword.value = `${keyword.value}:M${geometry.D}`;
    requireProperty(appearance, "description", "string").value = description;

    const bumpMap = findBumpGradientMap(appearance);
    if (!bumpMap) {
      throw new StoreOperationError(`Asset "${appearance.name}" has no bump gradient map`);
    }
    requireProperty(bumpMap, "texture_RealWorldScaleX", "distance").value = geometry.P / MM_PER_INCH;
    requireProperty(bumpMap, "texture_RealWorldScaleY", "distance").value = geometry.C / MM_PER_INCH;
    requireProperty(bumpMap, "texture_WAngle", "double").value = 90 - geometry.beta;
    requireProperty(bumpMap, "texture_ScaleLock", "boolean").value = false;
    requireProperty(bumpMap, "texture_URepeat", "boolean").value = true;
    requireProperty(bumpMap, "texture_VRepeat", "boolean").value = true;

    const material: MaterialRecord = {
      id: this.nextId(),
      name,
      document: this.doc.title,
      parameters: {
        ...template.parameters,
        manufacturer: this.options.author,
        comments,
        url: repositoryUrl,
        description,
      },
      appearance,
    };
    this.doc.materials.push(material);
    return material;
  }

  delete(ref: MaterialRecord): void {
    this.assertTransaction(`delete "${ref.name}"`);
    if (!this.options.codec.isArtifactName(ref.name)) {
      throw new StoreOperationError(`Material "${ref.name}" is not a thread material`);
    }
    const index = this.doc.materials.findIndex((m) => m.id === ref.id);
    if (index < 0) {
      throw new StoreOperationError(`Material "${ref.name}" (${ref.id}) not found`);
    }
    this.doc.materials.splice(index, 1);
  }

  run<T>(name: string, body: () => T): T {
    if (this.transaction !== null) {
      throw new StoreOperationError(
        `Cannot start transaction "${name}" inside "${this.transaction}"`
      );
    }
    const snapshot = structuredClone(this.doc.materials);
    this.transaction = name;
    try {
      const result = body();
      this.dirty = true;
      this.committed.push(name);
      return result;
    } catch (error) {
      this.doc.materials = snapshot;
      throw new StoreOperationError(`Transaction "${name}" rolled back`, { cause: error });
    } finally {
      this.transaction = null;
    }
  }

  private assertTransaction(operation: string): void {
    if (this.transaction === null) {
      throw new StoreOperationError(`Cannot ${operation} outside a transaction`);
    }
  }

  private nextId(): string {
    const used = new Set(this.doc.materials.map((m) => m.id));
    let n = this.doc.materials.length + 1;
    while (used.has(`mat-${n}`)) {
      n++;
    }
    return `mat-${n}`;
  }
}
