/**
 * Exact attack success probabilities for a fixed corrupted count,
 * by enumerating every placement of the corrupted validators and
 * applying the first-corrupted-quorum policy. Test oracle only.
 */
export function exactFixedCountProbabilities(
  layers: number,
  quorumSize: number,
  corruptedCount: number,
  thresholds: readonly number[]
): Map<number, number> {
  const validatorCount = layers * quorumSize;
  const hits = new Map<number, number>(thresholds.map(t => [t, 0]));
  let placements = 0;

  const visit = (start: number, chosen: number[]) => {
    if (chosen.length === corruptedCount) {
      placements++;
      const perQuorum = new Array<number>(layers).fill(0);
      for (const position of chosen) {
        perQuorum[Math.floor(position / quorumSize)]++;
      }
      for (const count of perQuorum) {
        const satisfied = thresholds.filter(t => count >= t);
        for (const t of satisfied) {
          hits.set(t, (hits.get(t) ?? 0) + 1);
        }
        if (satisfied.length > 0) break;
      }
      return;
    }
    for (let position = start; position < validatorCount; position++) {
      visit(position + 1, [...chosen, position]);
    }
  };
  visit(0, []);

  return new Map(thresholds.map(t => [t, (hits.get(t) ?? 0) / placements]));
}
