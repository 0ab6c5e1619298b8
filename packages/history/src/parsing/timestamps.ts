const UNIX_SECONDS_PATTERN = /^\d+$/;
const ZONELESS_DATE_TIME_PATTERN = /^(\d{4}-\d{2}-\d{2})[T ](\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?)$/;

// Date-times without `Z` or an offset are read as UTC.
const withUtcZone = (value: string): string => {
  const match = ZONELESS_DATE_TIME_PATTERN.exec(value);
  return match === null ? value : `${match[1] ?? ""}T${match[2] ?? ""}Z`;
};

/** Accepts unix seconds (number or digit string) or an ISO-8601 string; zone-less date-times are UTC. */
export const parseTimestamp = (value: string | number): number | null => {
  if (typeof value === "number") {
    return Number.isFinite(value) && value >= 0 ? value : null;
  }

  const trimmed = value.trim();
  if (trimmed.length === 0) {
    return null;
  }

  if (UNIX_SECONDS_PATTERN.test(trimmed)) {
    return Number.parseInt(trimmed, 10);
  }

  const parsedMs = Date.parse(withUtcZone(trimmed));
  if (Number.isNaN(parsedMs)) {
    return null;
  }

  return parsedMs / 1000;
};

export const parseOptionalTimestamp = (
  value: string | number | null | undefined,
): { ok: true; value: number | null } | { ok: false } => {
  if (value === null || value === undefined) {
    return { ok: true, value: null };
  }

  const parsed = parseTimestamp(value);
  return parsed === null ? { ok: false } : { ok: true, value: parsed };
};
