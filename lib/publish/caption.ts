export const MAX_CAPTION_LENGTH = 2200;
export const MAX_HASHTAGS = 30;

export function normalizeHashtag(tag: string) {
  return `#${tag.trim().replace(/^#+/, "")}`;
}

/** Caption followed by a blank line and the hashtags, the way both platforms render them best. */
export function composeCaption(caption: string, hashtags: string[] = []) {
  const tags = hashtags.map((tag) => tag.trim()).filter(Boolean).map(normalizeHashtag);
  const body = caption.trim();

  if (tags.length === 0) {
    return body;
  }

  return body ? `${body}\n\n${tags.join(" ")}` : tags.join(" ");
}
