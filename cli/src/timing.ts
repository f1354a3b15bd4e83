export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Random integer in [min, max]. */
export function randomBetween(min: number, max: number, random: () => number = Math.random): number {
  if (max <= min) return min;
  return min + Math.floor(random() * (max - min + 1));
}
