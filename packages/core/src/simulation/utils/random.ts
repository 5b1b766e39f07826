export type RandomSource = () => number;

// Mulberry32: small, fast deterministic PRNG
export function createSeededRandom(seed: number): RandomSource {
  let t = seed >>> 0;
  return () => {
    t += 0x6d2b79f5;
    let x = Math.imul(t ^ (t >>> 15), 1 | t);
    x ^= x + Math.imul(x ^ (x >>> 7), 61 | x);
    return ((x ^ (x >>> 14)) >>> 0) / 4294967296;
  };
}

export function randomInt(random: RandomSource, minIncl: number, maxIncl: number): number {
  return Math.floor(random() * (maxIncl - minIncl + 1)) + minIncl;
}
