/**
 * VersionChecker: latest GitHub release vs. the running version
 */

export const APP_VERSION = "0.1.0";

export const TIMEOUT_RELEASE_CHECK = 10_000;

export interface UpdateInfo {
  current: string;
  latest: string | null;
  updateAvailable: boolean;
  releaseUrl?: string;
  /** Why no comparison was made */
  reason?: string;
}

/** "v1.2.3-beta" → "1.2.3" */
export function extractVersion(tag: string): string | null {
  const match = /v?(\d+\.\d+\.\d+)/.exec(tag);
  return match ? match[1] : null;
}

/** Positive when a > b */
export function compareVersions(a: string, b: string): number {
  const pa = a.split(".").map(n => parseInt(n, 10) || 0);
  const pb = b.split(".").map(n => parseInt(n, 10) || 0);
  const len = Math.max(pa.length, pb.length);
  for (let i = 0; i < len; i++) {
    const diff = (pa[i] ?? 0) - (pb[i] ?? 0);
    if (diff !== 0) return diff;
  }
  return 0;
}

function noUpdate(current: string, reason: string): UpdateInfo {
  return { current, latest: null, updateAvailable: false, reason };
}

/**
 * Never throws: network errors, timeouts and unexpected payloads all read as
 * "no update" with a reason.
 */
export async function checkForUpdate(repo: string | undefined, current: string = APP_VERSION): Promise<UpdateInfo> {
  if (!repo) return noUpdate(current, "no repository configured");
  try {
    const res = await fetch(`https://api.github.com/repos/${repo}/releases/latest`, {
      headers: { Accept: "application/vnd.github+json" },
      signal: AbortSignal.timeout(TIMEOUT_RELEASE_CHECK),
    });
    if (!res.ok) return noUpdate(current, `GitHub API ${res.status}`);
    const body: unknown = await res.json();
    if (typeof body !== "object" || body === null) return noUpdate(current, "unexpected response");
    const tag = "tag_name" in body && typeof body.tag_name === "string" ? body.tag_name : "";
    const url = "html_url" in body && typeof body.html_url === "string" ? body.html_url : undefined;
    const latest = extractVersion(tag);
    if (!latest) return noUpdate(current, `unrecognized release tag "${tag}"`);
    return {
      current,
      latest,
      updateAvailable: compareVersions(latest, current) > 0,
      releaseUrl: url,
    };
  } catch (err) {
    return noUpdate(current, err instanceof Error ? err.message : String(err));
  }
}
