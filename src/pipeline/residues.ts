/** The 20 standard amino acids. */
export const STANDARD_RESIDUES: ReadonlySet<string> = new Set("ACDEFGHIKLMNPQRSTVWY");

export const HYDROPHOBIC: ReadonlySet<string> = new Set("AILMFWYV");
export const AROMATIC: ReadonlySet<string> = new Set("FWY");
export const CHARGED: ReadonlySet<string> = new Set("KRDE");
export const POLAR: ReadonlySet<string> = new Set("NQST");
export const POSITIVE: ReadonlySet<string> = new Set("KR");

export function countIn(segment: string, residues: ReadonlySet<string>): number {
  let count = 0;
  for (const aa of segment) {
    if (residues.has(aa)) count++;
  }
  return count;
}

/** Share of `segment` drawn from `residues`; 0 for an empty segment. */
export function fractionIn(segment: string, residues: ReadonlySet<string>): number {
  return segment.length === 0 ? 0 : countIn(segment, residues) / segment.length;
}

/** Length of the longest run of one repeated residue. */
export function longestRun(sequence: string): number {
  if (sequence.length === 0) return 0;
  let longest = 1;
  let current = 1;
  for (let i = 1; i < sequence.length; i++) {
    current = sequence[i] === sequence[i - 1] ? current + 1 : 1;
    if (current > longest) longest = current;
  }
  return longest;
}
