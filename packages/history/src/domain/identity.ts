import type { ContributorId } from "@collabscope/core";

export type IdentityParts = {
  login: string | null;
  email: string;
  name: string;
};

const GITHUB_NOREPLY_PATTERN = /^(?:\d+\+)?([^@]+)@users\.noreply\.github\.com$/;

export const normalizeEmail = (email: string): string => email.trim().toLowerCase();

export const noReplyHandle = (email: string): string | null => {
  const handle = normalizeEmail(email).match(GITHUB_NOREPLY_PATTERN)?.[1]?.trim();
  return handle === undefined || handle.length === 0 ? null : handle;
};

export const normalizeIdentity = ({ login, email, name }: IdentityParts): ContributorId => {
  const normalizedLogin = login?.trim().toLowerCase() ?? "";
  if (normalizedLogin.length > 0) {
    return normalizedLogin;
  }

  const handle = noReplyHandle(email);
  if (handle !== null) {
    return handle;
  }

  const normalizedEmail = normalizeEmail(email);
  if (normalizedEmail.length > 0) {
    return normalizedEmail;
  }

  const normalizedName = name.trim().replace(/\s+/g, " ").toLowerCase();
  return normalizedName.length > 0 ? normalizedName : "unknown";
};

/**
 * Maps commit emails to the account login they were seen with. When one email
 * appears under several logins the most frequent wins, then the smallest login.
 */
export const buildEmailLoginMap = (
  sightings: ReadonlyArray<{ email: string; login: string | null }>,
): ReadonlyMap<string, string> => {
  const countsByEmail = new Map<string, Map<string, number>>();

  for (const sighting of sightings) {
    const email = normalizeEmail(sighting.email);
    const login = sighting.login?.trim().toLowerCase() ?? "";
    if (email.length === 0 || login.length === 0) {
      continue;
    }

    const counts = countsByEmail.get(email) ?? new Map<string, number>();
    counts.set(login, (counts.get(login) ?? 0) + 1);
    countsByEmail.set(email, counts);
  }

  const result = new Map<string, string>();
  for (const [email, counts] of countsByEmail.entries()) {
    const best = [...counts.entries()].sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]))[0];
    if (best !== undefined) {
      result.set(email, best[0]);
    }
  }

  return result;
};
