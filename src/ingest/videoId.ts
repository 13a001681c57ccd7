const VIDEO_ID_RE = /^[A-Za-z0-9_-]{11}$/;
const YOUTUBE_HOSTS = new Set(["youtube.com", "m.youtube.com", "music.youtube.com"]);

function validId(candidate: string | null | undefined): string | undefined {
  const id = candidate?.trim();
  return id && VIDEO_ID_RE.test(id) ? id : undefined;
}

/**
 * Canonical 11-character video id for watch, youtu.be, shorts, live and
 * embed URLs; undefined for anything else.
 */
export function tryExtractVideoIdFromUrl(urlString: string): string | undefined {
  let url: URL;
  try {
    url = new URL(urlString.trim());
  } catch {
    return undefined;
  }
  const host = url.hostname.replace(/^www\./, "");
  if (host === "youtu.be") {
    return validId(url.pathname.split("/")[1]);
  }
  if (!YOUTUBE_HOSTS.has(host)) return undefined;
  if (url.pathname === "/watch") {
    return validId(url.searchParams.get("v"));
  }
  const m = url.pathname.match(/^\/(?:shorts|live|embed)\/([^/]+)/);
  return validId(m?.[1]);
}

export function canonicalVideoUrl(videoId: string): string {
  return `https://www.youtube.com/watch?v=${videoId}`;
}

export function tryExtractChannelId(channelUrl: string | undefined): string | undefined {
  if (!channelUrl) return undefined;
  let url: URL;
  try {
    url = new URL(channelUrl.trim());
  } catch {
    return undefined;
  }
  const m = url.pathname.match(/^\/channel\/([A-Za-z0-9_-]+)/);
  return m?.[1];
}
