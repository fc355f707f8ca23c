export interface HelperOutcome {
  /** In [0, 1]. */
  score: number;
  success: boolean;
  /** "OK" on full credit, "PARTIAL" on partial credit, otherwise a miss code. */
  reasonCode: string;
  detail: Record<string, unknown>;
}

export function scoredOutcome(score: number, detail: Record<string, unknown>, missCode = "MISMATCH"): HelperOutcome {
  const clamped = Math.min(1, Math.max(0, score));
  return {
    score: clamped,
    success: clamped >= 1,
    reasonCode: clamped >= 1 ? "OK" : clamped > 0 ? "PARTIAL" : missCode,
    detail
  };
}

export function passFail(passed: boolean, detail: Record<string, unknown>, missCode: string): HelperOutcome {
  return scoredOutcome(passed ? 1 : 0, detail, missCode);
}

/** The weakest outcome decides the score; details of every part are kept. */
export function combineMin(parts: Array<{ name: string; outcome: HelperOutcome }>): HelperOutcome {
  if (parts.length === 0) {
    return scoredOutcome(1, {});
  }
  let weakest = parts[0];
  for (const part of parts) {
    if (part.outcome.score < weakest.outcome.score) {
      weakest = part;
    }
  }
  const detail: Record<string, unknown> = {};
  for (const part of parts) {
    detail[part.name] = { score: part.outcome.score, reasonCode: part.outcome.reasonCode, ...part.outcome.detail };
  }
  return {
    score: weakest.outcome.score,
    success: parts.every((part) => part.outcome.success),
    reasonCode: weakest.outcome.reasonCode,
    detail
  };
}
