const TRACKING_PARAM_PREFIXES = ["utm_", "fbclid", "gclid", "msclkid"];

/**
 * Lowercase scheme and host, drop default ports, fragments and tracking
 * parameters. Unparseable input comes back trimmed.
 */
export function canonicalizeUrl(rawUrl: string): string {
  try {
    const parsed = new URL(String(rawUrl || "").trim());
    parsed.protocol = parsed.protocol.toLowerCase();
    parsed.hostname = parsed.hostname.toLowerCase();

    if (
      (parsed.protocol === "https:" && parsed.port === "443") ||
      (parsed.protocol === "http:" && parsed.port === "80")
    ) {
      parsed.port = "";
    }
    parsed.hash = "";

    for (const key of Array.from(parsed.searchParams.keys())) {
      const lowered = key.toLowerCase();
      if (TRACKING_PARAM_PREFIXES.some((prefix) => lowered.startsWith(prefix))) {
        parsed.searchParams.delete(key);
      }
    }

    const normalized = parsed.toString();
    return normalized.endsWith("/")
      ? normalized.slice(0, normalized.length - 1)
      : normalized;
  } catch {
    return String(rawUrl || "").trim();
  }
}

export function isHttpUrl(url: string): boolean {
  return /^https?:\/\//i.test(String(url || "").trim());
}

/** Accepts "example.org/page" as well as full URLs. */
export function normalizeTargetUrl(raw: string): string {
  const trimmed = raw.trim();
  return isHttpUrl(trimmed) ? trimmed : `https://${trimmed}`;
}

/** Substitute the URL-encoded term into a `{term}` search template. */
export function buildSearchUrl(template: string, term: string): string {
  return template.split("{term}").join(encodeURIComponent(term.trim()));
}

/**
 * True when `href` points back at the search entry itself (pagination,
 * sort and "search instead for" links) rather than at a result.
 */
export function isSearchPageLink(href: string, searchUrl: string): boolean {
  try {
    const target = new URL(href);
    const search = new URL(searchUrl);
    return target.host === search.host && target.pathname === search.pathname;
  } catch {
    return false;
  }
}
