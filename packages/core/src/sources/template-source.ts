/**
 * Template source contract
 * @module @faultline/core/sources/template-source
 */

/**
 * Where the registry reads its catalog from.
 * The index lists template entries; each entry points at a rendering definition by path.
 */
export interface TemplateSource {
  /** Human-readable location, used in errors and logs */
  readonly location: string;

  /** Parsed index document */
  readIndex(): Promise<unknown>;

  /** Raw text of a rendering definition */
  readDefinition(path: string): Promise<string>;
}
