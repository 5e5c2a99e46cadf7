/** Uniform source in `[0, 1)`, the contract of `Math.random`. */
export type RandomSource = () => number;

export const defaultRandomSource: RandomSource = Math.random;

/** Sale quantity for one line item: a fair roll of a die with `faces` sides. */
export function rollQuantity(faces: number, random: RandomSource = defaultRandomSource): number {
  if (!Number.isInteger(faces) || faces < 1) {
    throw new RangeError(`A die needs a positive whole number of faces, got ${faces}.`);
  }

  const draw = Math.floor(random() * faces) + 1;
  return Math.min(faces, Math.max(1, draw));
}
