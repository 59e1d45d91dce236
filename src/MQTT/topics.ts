export interface TopicSyntax {
  readonly separator: string;
  /** Matches exactly one level. */
  readonly single: string;
  /** Matches zero or more levels. */
  readonly multi: string;
  /** Topics starting with this prefix are not matched by a leading wildcard. */
  readonly systemPrefix?: string;
}

export const MQTT_SYNTAX: TopicSyntax = { separator: '/', single: '+', multi: '#', systemPrefix: '$' };

export const AMQP_SYNTAX: TopicSyntax = { separator: '.', single: '*', multi: '#' };

const matchLevels = (pattern: string[], p: number, topic: string[], t: number, syntax: TopicSyntax): boolean => {
  if (p === pattern.length) return t === topic.length;

  const level = pattern[p];
  if (level === syntax.multi) {
    for (let skip = t; skip <= topic.length; skip++) {
      if (matchLevels(pattern, p + 1, topic, skip, syntax)) return true;
    }
    return false;
  }
  if (t === topic.length) return false;
  if (level !== syntax.single && level !== topic[t]) return false;
  return matchLevels(pattern, p + 1, topic, t + 1, syntax);
};

/**
 * Whether `topic` is matched by the subscription filter `pattern`.
 *
 * @example
 * topicMatches('a/#', 'a/b/c') // true
 * topicMatches('a/#', 'a') // true
 * topicMatches('a/+/c', 'a/b/d/c') // false
 */
export const topicMatches = (pattern: string, topic: string, syntax: TopicSyntax = MQTT_SYNTAX): boolean => {
  const patternLevels = pattern.split(syntax.separator);
  const first = patternLevels[0];
  if (
    syntax.systemPrefix &&
    topic.startsWith(syntax.systemPrefix) &&
    (first === syntax.single || first === syntax.multi)
  ) {
    return false;
  }
  return matchLevels(patternLevels, 0, topic.split(syntax.separator), 0, syntax);
};

/** Joins a topic root and a routing suffix. Either may be empty. */
export const joinTopic = (root: string, routing: string, syntax: TopicSyntax = MQTT_SYNTAX): string =>
  [root, routing].filter((part) => part.length > 0).join(syntax.separator);
