export const levenshtein = (a: string, b: string) => {
  if (a === b) return 0;
  const aLen = a.length;
  const bLen = b.length;
  if (aLen === 0) return bLen;
  if (bLen === 0) return aLen;
  let prev = Array.from({ length: bLen + 1 }, (_, j) => j);
  let curr = new Array<number>(bLen + 1).fill(0);
  for (let i = 1; i <= aLen; i += 1) {
    curr[0] = i;
    for (let j = 1; j <= bLen; j += 1) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      curr[j] = Math.min(prev[j] + 1, curr[j - 1] + 1, prev[j - 1] + cost);
    }
    [prev, curr] = [curr, prev];
  }
  return prev[bLen];
};

/** Edit-distance similarity on a 0..100 scale. */
export const ratio = (a: string, b: string) => {
  if (!a && !b) return 100;
  const longest = Math.max(a.length, b.length);
  return (1 - levenshtein(a, b) / longest) * 100;
};

/** Best ratio of the shorter string against every same-length window of the longer one. */
export const partialRatio = (a: string, b: string) => {
  const [short, long] = a.length <= b.length ? [a, b] : [b, a];
  if (!short) return long ? 0 : 100;
  if (long.includes(short)) return 100;
  let best = 0;
  for (let i = 0; i <= long.length - short.length; i += 1) {
    const score = ratio(short, long.slice(i, i + short.length));
    if (score > best) best = score;
    if (best === 100) break;
  }
  return best;
};

const tokens = (text: string) => text.split(/\s+/).filter(Boolean);

export const tokenSortRatio = (a: string, b: string) =>
  ratio(tokens(a).sort().join(" "), tokens(b).sort().join(" "));

/**
 * Compares the shared tokens against each side's full token set, so a query
 * that names only part of a card ("tower") still scores against "the tower".
 */
export const tokenSetRatio = (a: string, b: string) => {
  const setA = new Set(tokens(a));
  const setB = new Set(tokens(b));
  const shared = [...setA].filter((token) => setB.has(token)).sort();
  const onlyA = [...setA].filter((token) => !setB.has(token)).sort();
  const onlyB = [...setB].filter((token) => !setA.has(token)).sort();
  const base = shared.join(" ");
  const withA = [base, onlyA.join(" ")].filter(Boolean).join(" ");
  const withB = [base, onlyB.join(" ")].filter(Boolean).join(" ");
  if (shared.length > 0 && (onlyA.length === 0 || onlyB.length === 0)) return 100;
  return Math.max(ratio(base, withA), ratio(base, withB), ratio(withA, withB));
};

const TOKEN_SCALE = 0.95;
const PARTIAL_SCALE = 0.9;
const PARTIAL_LENGTH_RATIO = 1.5;

/**
 * Weighted similarity on 0..100: plain ratio, token-order-insensitive scores
 * scaled by 0.95, and a substring score scaled by 0.9 that only applies when
 * one side is at least 1.5x longer than the other.
 */
export const weightedRatio = (a: string, b: string) => {
  if (!a || !b) return 0;
  const scores = [
    ratio(a, b),
    tokenSortRatio(a, b) * TOKEN_SCALE,
    tokenSetRatio(a, b) * TOKEN_SCALE,
  ];
  const lengthRatio = Math.max(a.length, b.length) / Math.min(a.length, b.length);
  if (lengthRatio >= PARTIAL_LENGTH_RATIO) {
    scores.push(partialRatio(a, b) * PARTIAL_SCALE);
  }
  return Math.round(Math.max(...scores) * 100) / 100;
};
