/**
 * Marker strings framing a placeholder name, e.g. `«` and `»` in `«Name»`
 */
export interface Delimiters {
  open: string;
  close: string;
}

/**
 * One row of the data source: field name -> text value.
 * Empty and missing cells are `''`.
 */
export type DataRecord = Readonly<Record<string, string>>;

/**
 * Ordered placeholder name -> field name configuration
 */
export type PlaceholderMapping = Readonly<Record<string, string>>;

/**
 * A uniformly styled span of text inside a {@link TextContainer}
 */
export interface TextRun {
  text: string;

  /** Detaches the run from its container */
  remove(): void;
}

/**
 * A paragraph-like unit whose text is the ordered concatenation of its runs
 */
export interface TextContainer<R extends TextRun = TextRun> {
  readonly runs: readonly R[];
  readonly text: string;
}

/**
 * Options shared by scanning and rendering
 */
export interface TraversalOptions {
  /**
   * Placeholder markers.
   * @default { open: '«', close: '»' }
   */
  delimiters?: Delimiters;

  /**
   * Visit header and footer parts as well as the body.
   * @default true
   */
  includeHeadersFooters?: boolean;
}

/**
 * Rows read from a tabular source
 */
export interface TabularData {
  /** Name of the sheet the rows came from */
  sheet: string;

  /** Header names in column order */
  columns: string[];

  records: DataRecord[];
}
