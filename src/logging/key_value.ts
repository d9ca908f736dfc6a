/**
 * One structured field of a log line, already rendered as text.
 */
export interface KeyValuePair {
  key: string;
  value: string;
}

/**
 * Turns the structured details attached to a log call into key/value pairs.
 */
export type DetailsParser<T = unknown> = (details: T) => KeyValuePair[];
