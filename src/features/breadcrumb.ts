const MAX_SEGMENT = 30;
const MAX_TRAIL = 95;

type ListItem = { name?: string | null };

/**
 * Trail shown under a result title, e.g. `example.com > docs > guide`.
 * Uses the page's structured breadcrumb list when the API returns one and
 * falls back to the URL path otherwise.
 */
export function breadcrumbTrail(link: string, displayLink: string, listItems: ListItem[] = []): string {
  if (listItems.length) {
    const names = listItems.slice(0, -1).map((li) => li.name ?? "");
    return [displayLink, ...names].join(" > ");
  }
  return trailFromUrl(link);
}

export function trailFromUrl(link: string): string {
  const withoutScheme = link.replace(/https?:\/\//, "");
  const trail = withoutScheme.replace(/(.*?)(\?|\.php|\.html).*/, "$1");
  return refineTrail(trail.split("/").filter(Boolean));
}

function refineTrail(segments: string[]): string {
  const shorten = (s: string) => (s.length > MAX_SEGMENT ? "..." : s);
  const parts =
    segments.length > 1
      ? [segments[0], ...segments.slice(1, -1).map(shorten), segments[segments.length - 1]]
      : segments;
  const trail = parts.join(" > ");
  return trail.length > MAX_TRAIL ? trail.slice(0, MAX_TRAIL) + "..." : trail;
}
