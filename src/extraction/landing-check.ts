export type LandingIssueKind = "login_wall" | "captcha" | "checkpoint" | "unexpected_location";

export interface LandingCheckResult {
  ok: boolean;
  kind: LandingIssueKind | null;
  evidence: string[];
}

interface UrlRule {
  kind: Exclude<LandingIssueKind, "unexpected_location">;
  regex: RegExp;
  evidence: string;
}

const URL_RULES: UrlRule[] = [
  { kind: "login_wall", regex: /\/(login|signin|sign-in|authwall|uas\/login)\b/i, evidence: "login path" },
  { kind: "captcha", regex: /captcha|challenge/i, evidence: "challenge path" },
  { kind: "checkpoint", regex: /\/checkpoint\//i, evidence: "checkpoint path" },
];

/** Path of the landed URL; query and hash often echo the requested location. */
export const landedPath = (currentUrl: string): string => {
  try {
    return new URL(currentUrl).pathname;
  } catch {
    return currentUrl.split(/[?#]/)[0] ?? "";
  }
};

/**
 * Classifies the landed URL. Access-wall paths fail first, then the path must
 * match the profile's expected landing pattern.
 */
export const checkLanding = (currentUrl: string, landingPattern: string): LandingCheckResult => {
  const path = landedPath(currentUrl);

  const evidence: string[] = [];
  let kind: LandingIssueKind | null = null;
  for (const rule of URL_RULES) {
    if (rule.regex.test(path)) {
      evidence.push(rule.evidence);
      kind ??= rule.kind;
    }
  }
  if (kind) return { ok: false, kind, evidence };

  if (new RegExp(landingPattern, "i").test(path)) {
    return { ok: true, kind: null, evidence: [] };
  }
  return { ok: false, kind: "unexpected_location", evidence };
};
