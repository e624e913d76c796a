import { isValid, parse, parseISO } from 'date-fns';

const TIME = String.raw`\d{2}:\d{2}(?::\d{2}(?:[.,]\d+)?)?`;
const ZONED_ISO = new RegExp(String.raw`^\d{4}-\d{2}-\d{2}[T ]${TIME}(?:Z|[+-]\d{2}(?::?\d{2})?)$`);
const LOCAL_ISO = new RegExp(String.raw`^\d{4}-\d{2}-\d{2}[T ]${TIME}$`);

/** Tried in order when the value is not ISO-8601. All of them carry a zone. */
export const FALLBACK_TIMESTAMP_FORMATS = [
  "yyyy-MM-dd'T'HH:mm:ssXXX",
  'yyyy-MM-dd HH:mm:ssXXX',
  'yyyy-MM-dd HH:mm:ss xx',
  'yyyy-MM-dd HH:mm:ss XXX',
  'EEE MMM d HH:mm:ss yyyy xx',
] as const;

export interface ParsedTimestamp {
  timestamp: Date;
  /** True when nothing matched and `timestamp` is the current time. */
  fallback: boolean;
}

function parseIsoInstant(value: string): Date | null {
  // No zone designator: the provider meant UTC.
  const candidate = ZONED_ISO.test(value) ? value : LOCAL_ISO.test(value) ? `${value}Z` : null;
  if (!candidate) return null;
  const date = parseISO(candidate);
  return isValid(date) ? date : null;
}

export function parseCommitTimestamp(
  value: string | null | undefined,
  now: () => Date = () => new Date(),
): ParsedTimestamp {
  const raw = value?.trim();
  if (raw) {
    const iso = parseIsoInstant(raw);
    if (iso) return { timestamp: iso, fallback: false };

    for (const format of FALLBACK_TIMESTAMP_FORMATS) {
      const date = parse(raw, format, new Date(0));
      if (isValid(date)) return { timestamp: date, fallback: false };
    }
  }
  return { timestamp: now(), fallback: true };
}
