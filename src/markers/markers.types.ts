// Marker formats found in symbols files, newest first
export type MarkerFormat = "current" | "legacy";

/** Delimiters of one named block in a symbols file */
export interface BlockMarker {
  format: MarkerFormat;
  /** Lookup key: normalized with `normalizeVariantName` */
  name: string;
  begin: string;
  end: string;
}
