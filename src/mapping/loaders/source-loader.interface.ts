/**
 * ISourceLoader - reads one kind of mapping source into uniform records.
 *
 * Loaders are leaf components of the mapping build: they know file
 * formats, nothing about resolution. Every failure to read or validate a
 * required file surfaces as a SourceLoadError naming the loader and path.
 *
 * ```typescript
 * const records = await loader.load('vsn700', '/data/sources/vsn700');
 * ```
 */
export interface ISourceLoader<TKind extends string, TRecord> {
  /**
   * Loader identifier, used in logs and SourceLoadError messages.
   */
  readonly name: string;

  /**
   * Human-readable description of the source format.
   */
  readonly description: string;

  /**
   * @param kind - which variant of the source (vocabulary or standards origin)
   * @param sourcePath - capture directory or workbook file
   * @throws SourceLoadError if a required file is missing or malformed
   */
  load(kind: TKind, sourcePath: string): Promise<TRecord[]>;
}
