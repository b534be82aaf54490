/**
 * Text signatures of upstream quota, throttling and billing failures.
 * Matched against raw CLI/API output; no network involved.
 */
export const RATE_LIMIT_PATTERNS: readonly RegExp[] = [
  /rate[\s_-]?limit/i,
  /\b(HTTP|status|code|error)[\s:=]*429\b/i,
  /\b429 too many\b/i,
  /too many requests/i,
  /quota[\s_-]?(exceeded|exhausted)/i,
  /exceeded (your|the) (current )?quota/i,
  /RESOURCE_EXHAUSTED/,
  /credit balance (is )?too low/i,
  /insufficient[\s_-]?credits?/i,
  /billing[\s_-]?(limit|hard[\s_-]?limit|quota)/i,
  /billing (account )?(is )?(not active|inactive|exceeded|required)/i,
  /usage limit/i,
];

/** Source of the first matching pattern, or null */
export function matchRateLimit(text: string): string | null {
  for (const pattern of RATE_LIMIT_PATTERNS) {
    if (pattern.test(text)) {
      return pattern.source;
    }
  }
  return null;
}
