import type { SymbolsUpdate } from "#/symbols";

export interface CommitReport {
  /** Rules files written, in shard order */
  rules: string[];
  /** One entry per locale of the committed index */
  symbols: SymbolsUpdate[];
}
