export const DEFAULT_BLOG_DOMAINS: readonly string[] = [
  "wordpress.com",
  "blogspot.com",
  "medium.com",
  "substack.com",
  "tumblr.com",
  "ghost.io",
  "weebly.com",
  "wixsite.com",
  "squarespace.com",
  "livejournal.com",
  "typepad.com",
  "hubpages.com",
  "dev.to",
  "hashnode.dev",
  "github.io",
  "gitlab.io",
  "netlify.app",
  "vercel.app",
  "notion.site",
  "over-blog.com",
  "canalblog.com",
  "hatena.ne.jp",
  "ameblo.jp",
  "blog.sina.com.cn",
];

const BLOG_SUBDOMAIN_RE = /(^|\.)blog\d*\./;
const BLOG_PATH_RE = /\/(blog|blogs)(\/|$)/;
const LISTING_PATH_MARKERS = ["/category/", "/tag/", "/author/"];

type ParsedUrl = { ok: true; host: string; path: string } | { ok: false };

function parseUrl(url: string): ParsedUrl {
  const lowered = url.toLowerCase();
  if (!URL.canParse(lowered)) {
    return { ok: false };
  }
  const parsed = new URL(lowered);
  return { ok: true, host: parsed.hostname, path: parsed.pathname };
}

function matchesDomain(host: string, domains: readonly string[]): boolean {
  return domains.some((domain) => host === domain || host.endsWith(`.${domain}`));
}

export type UrlClassifier = (url: string) => boolean;

/**
 * Builds a predicate that decides whether a URL looks like an individual blog post.
 * Rules are checked in order and the first match wins:
 * known platform domain, `blogN.` subdomain, then a `/blog` or `/blogs` path segment
 * that is not a category, tag or author listing.
 */
export function createUrlClassifier(domains: readonly string[] = DEFAULT_BLOG_DOMAINS): UrlClassifier {
  const normalizedDomains = domains.map((domain) => domain.trim().toLowerCase()).filter((domain) => domain.length > 0);

  return (url: string): boolean => {
    const parsed = parseUrl(url);
    if (!parsed.ok) {
      return false;
    }

    if (matchesDomain(parsed.host, normalizedDomains)) {
      return true;
    }
    if (BLOG_SUBDOMAIN_RE.test(parsed.host)) {
      return true;
    }
    if (BLOG_PATH_RE.test(parsed.path)) {
      return !LISTING_PATH_MARKERS.some((marker) => parsed.path.includes(marker));
    }
    return false;
  };
}

export const isTargetUrl: UrlClassifier = createUrlClassifier();
