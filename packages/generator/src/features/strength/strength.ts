export type GeneratorStrength = {
  score: 0 | 1 | 2 | 3 | 4;
  label: "Very Weak" | "Weak" | "Fair" | "Strong" | "Excellent";
  entropyBits: number;
};

type StrengthBand = Omit<GeneratorStrength, "entropyBits"> & { belowBits: number };

/**
 * Upper entropy bound (exclusive) of each band. Passphrase entropy counts an
 * ordered draw without replacement plus its extras, so a six-word phrase from
 * a few thousand words with one digit and one symbol lands in "Strong".
 */
const STRENGTH_BANDS: readonly StrengthBand[] = [
  { belowBits: 28, score: 0, label: "Very Weak" },
  { belowBits: 40, score: 1, label: "Weak" },
  { belowBits: 64, score: 2, label: "Fair" },
  { belowBits: 96, score: 3, label: "Strong" }
];

export function strengthFromEntropy(entropyBits: number): GeneratorStrength {
  const bits = Number.isFinite(entropyBits) ? Math.max(0, entropyBits) : 0;
  const band = STRENGTH_BANDS.find((candidate) => bits < candidate.belowBits);

  return band
    ? { score: band.score, label: band.label, entropyBits: bits }
    : { score: 4, label: "Excellent", entropyBits: bits };
}
