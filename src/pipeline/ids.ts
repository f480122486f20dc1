export function toVideoId(videoOrUrl: string): string {
  // Extracts YouTube video ID from URL or returns the input if it looks like an ID
  const urlMatch = videoOrUrl.match(/[?&]v=([a-zA-Z0-9_-]{6,})/);
  if (urlMatch) return urlMatch[1];
  const short = videoOrUrl.match(/youtu\.be\/([a-zA-Z0-9_-]{6,})/);
  if (short) return short[1];
  const shorts = videoOrUrl.match(/\/shorts\/([a-zA-Z0-9_-]{6,})/);
  if (shorts) return shorts[1];
  return videoOrUrl;
}

export function toVideoUrl(videoOrUrl: string, baseUrl = 'https://www.youtube.com'): string {
  if (/^https?:\/\//.test(videoOrUrl)) return videoOrUrl;
  return `${baseUrl}/watch?v=${videoOrUrl}`;
}

export function watchUrl(videoId: string, seekSec: number, baseUrl = 'https://www.youtube.com'): string {
  return `${baseUrl}/watch?v=${videoId}&t=${Math.max(0, Math.floor(seekSec))}s`;
}
