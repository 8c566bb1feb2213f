import type { Verdict } from "@/lib/rating/types";

export type VerdictOption = {
  key: Verdict;
  label: string;
  meaning: string;
};

export const VERDICT_OPTIONS: VerdictOption[] = [
  {
    key: "no_error",
    label: "No error",
    meaning: "The report reads as clinically consistent.",
  },
  {
    key: "laterality_error",
    label: "Laterality error",
    meaning: "Left and right are swapped or contradict each other.",
  },
  {
    key: "negation_error",
    label: "Negation error",
    meaning: "A finding is asserted where it should be negated, or the reverse.",
  },
  {
    key: "other_error",
    label: "Other error",
    meaning: "Any other factual error; describe it in the comments.",
  },
];

export function isVerdict(value: unknown): value is Verdict {
  return VERDICT_OPTIONS.some((o) => o.key === value);
}

/** Accepts the key or the display label, case-insensitively. */
export function normalizeVerdict(value: unknown): Verdict | null {
  const raw = String(value ?? "").trim().toLowerCase();
  if (!raw) return null;
  const hit = VERDICT_OPTIONS.find((o) => o.key === raw || o.label.toLowerCase() === raw);
  return hit ? hit.key : null;
}

export function verdictLabel(verdict: Verdict) {
  return VERDICT_OPTIONS.find((o) => o.key === verdict)?.label ?? verdict;
}
