/**
 * Registration
 *
 * Commits a session's pending changes: rules files first, then symbols.
 *
 * There is no cross-file transaction. Each file is rewritten on its own and a
 * failure leaves the files already written in place; committing the same
 * index again converges.
 */

import type { XkbContext } from "#/core";
import { isIndexEmpty, type LayoutIndex } from "#/layoutIndex";
import { updateRules } from "#/rules";
import { updateSymbols } from "#/symbols";
import type { CommitReport } from "./registration.types";

/**
 * Write the index to disk, then empty it.
 * On failure the error is logged, then propagates and the index is kept for a retry.
 */
export function commitIndex(ctx: XkbContext, index: LayoutIndex): CommitReport {
  if (isIndexEmpty(index)) {
    return { rules: [], symbols: [] };
  }

  try {
    const rules = updateRules(ctx, index);
    const symbols = updateSymbols(ctx, index);

    index.clear();
    return { rules, symbols };
  } catch (error) {
    ctx.logger.error("commit failed", error, { root: ctx.paths.root });
    throw error;
  }
}
