/**
 * MQTT Module - Pure Transformations
 *
 * Topic-filter matching and message routing.
 */

/**
 * Check if a topic matches an MQTT topic filter.
 * - `+` matches exactly one level
 * - `#` matches the rest of the topic (it must be the last level)
 */
export function topicMatches(filter: string, topic: string): boolean {
  if (filter === topic) return true;

  const filterParts = filter.split("/");
  const topicParts = topic.split("/");

  for (let i = 0; i < filterParts.length; i++) {
    const part = filterParts[i];

    if (part === "#") return true;

    if (i >= topicParts.length) return false;

    if (part === "+") continue;

    if (part !== topicParts[i]) return false;
  }

  return filterParts.length === topicParts.length;
}

/**
 * Filters a topic is delivered to. Empty means the catch-all stream.
 */
export function matchingFilters(
  filters: ReadonlyArray<string>,
  topic: string,
): string[] {
  return filters.filter((filter) => topicMatches(filter, topic));
}
