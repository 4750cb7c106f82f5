/**
 * Texture reference by pack and name, e.g. ("SAMPLE", "floor_01").
 * The empty reference makes the renderer fall back to its checkerboard.
 */
export class TextureRef {
  constructor(
    readonly pack: string,
    readonly name: string,
  ) {}

  static none(): TextureRef {
    return new TextureRef("", "");
  }

  isValid(): boolean {
    return this.pack.length > 0 && this.name.length > 0;
  }

  equals(other: TextureRef): boolean {
    return this.pack === other.pack && this.name === other.name;
  }

  toString(): string {
    return this.isValid() ? `${this.pack}/${this.name}` : "<none>";
  }
}

/**
 * Asset catalog lookup consumed by the engine: does (pack, name) exist?
 */
export interface TextureCatalog {
  has(texture: TextureRef): boolean;
}
