/** Outcome of rewriting one symbols/<locale> file */
export interface SymbolsUpdate {
  path: string;
  locale: string;
  installed: string[];
  removed: string[];
  /** False when the file already had the expected content */
  changed: boolean;
}
