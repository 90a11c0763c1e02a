/**
 * Compacts raw ids into dense ids 1..K following scan order.
 *
 * Invalid positions become 0. Among valid positions, a new id is issued each
 * time the raw id differs from the previous valid position's raw id, so
 * numbers are never reused even when raw ids repeat, jump or decrease.
 *
 * Example: rawIds [4, 4, 2, 9, 9], valid [1, 1, 0, 1, 1] → [1, 1, 0, 2, 2]
 */
export function renumber(rawIds: ArrayLike<number>, valid: ArrayLike<number>): Uint32Array {
  const out = new Uint32Array(rawIds.length);
  let dense = 0;
  let previous = -1;
  for (let i = 0; i < rawIds.length; i++) {
    if (!valid[i]) continue;
    const raw = rawIds[i];
    if (dense === 0 || raw !== previous) {
      dense += 1;
      previous = raw;
    }
    out[i] = dense;
  }
  return out;
}

/** Validity mask of an already renumbered column: every non-zero id. */
export function positiveMask(ids: ArrayLike<number>): Uint8Array {
  const mask = new Uint8Array(ids.length);
  for (let i = 0; i < ids.length; i++) {
    mask[i] = ids[i] > 0 ? 1 : 0;
  }
  return mask;
}
