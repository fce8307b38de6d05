const ENGINE_TAG_PATTERN = /<\s*\|[^|]*\|\s*>/g;

const EMOJI_PATTERN =
  /[\u{1F600}-\u{1F64F}\u{1F300}-\u{1F5FF}\u{1F680}-\u{1F6FF}\u{1F1E0}-\u{1F1FF}\u{2702}-\u{27B0}\u{1F900}-\u{1F9FF}\u{1FA00}-\u{1FA6F}\u{1FA70}-\u{1FAFF}\u{2600}-\u{26FF}\u{2700}-\u{27BF}]+/gu;

/** Drop `<|…|>` language/emotion/event markup and collapse whitespace. */
export const removeEngineTags = (value: string): string => {
  if (!value) return "";
  return value.replace(ENGINE_TAG_PATTERN, "").replace(/\s+/g, " ").trim();
};

export const removeEmoji = (value: string): string =>
  value.replace(EMOJI_PATTERN, "").trim();

export const cleanHighFidelityText = (value: string): string =>
  removeEmoji(removeEngineTags(value));
