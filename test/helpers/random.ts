/** Deterministic generator (mulberry32) so generated-input tests replay identically. */
export function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function pick<T>(rand: () => number, items: readonly T[]): T {
  return items[Math.floor(rand() * items.length)];
}

export function randomWord(rand: () => number, length: number): string {
  let word = "";
  for (let i = 0; i < length; i++) {
    word += String.fromCharCode(97 + Math.floor(rand() * 26));
  }
  return word;
}
