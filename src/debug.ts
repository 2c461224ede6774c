const DEBUG_TAGS = (() => {
  try {
    const raw = process.env.TRAFFIC_DEBUG ?? "";
    return new Set(
      raw
        .split(",")
        .map((tag) => tag.trim())
        .filter((tag) => tag.length > 0)
    );
  } catch {
    return new Set<string>();
  }
})();

export function isDebugEnabled(tag: string): boolean {
  return DEBUG_TAGS.has("1") || DEBUG_TAGS.has("*") || DEBUG_TAGS.has(tag);
}

export function createDebugLog(tag: string): (...args: unknown[]) => void {
  const enabled = isDebugEnabled(tag);
  return (...args: unknown[]) => {
    if (enabled) {
      console.debug(`[${tag}]`, ...args);
    }
  };
}
