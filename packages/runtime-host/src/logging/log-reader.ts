/**
 * Switchboard Runtime Host - Change Log Reader
 *
 * Pure function for reading the JSONL option change log with
 * dedupe-on-read. Accepts raw JSONL text and returns typed records.
 *
 * Guarantees:
 *   - every well-formed record is returned; malformed lines are dropped
 *     and counted in parseErrors
 *   - records are deduplicated by event_id; first-seen wins
 *   - content not ending with '\n' has its last (partial) line dropped
 *     and flagged
 *   - output is sorted by (timestamp asc, event_id asc)
 *   - empty input returns an empty result with zero stats
 *
 * This function has no I/O. Callers obtain raw content via StateIO.readLogRaw().
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** One line of option-changes.jsonl. */
export interface ChangeLogRecord {
  /** 26-character ULID, the deduplication key. */
  readonly event_id: string;
  /** ISO 8601 timestamp. */
  readonly timestamp: string;
  readonly option: string | null;
  readonly letter: string | null;
  readonly access: string;
  readonly requested: number;
  readonly previous: number;
  readonly outcome: string;
}

export interface LogReadStats {
  /** Number of non-empty lines processed (before filtering). */
  totalLines: number;
  /** Number of records returned (after dedup). */
  parsedEvents: number;
  /** Number of records dropped because their event_id was already seen. */
  duplicates: number;
  /** Number of lines dropped as invalid JSON or not a change record. */
  parseErrors: number;
  /** True if the raw content did not end with '\n'. */
  partialTrailingLine: boolean;
}

export interface LogReadResult {
  records: ReadonlyArray<ChangeLogRecord>;
  stats: LogReadStats;
}

// ---------------------------------------------------------------------------
// Record validation
// ---------------------------------------------------------------------------

function stringOrNull(value: unknown): value is string | null {
  return value === null || typeof value === 'string';
}

/** Validate a parsed JSON value as a change record; null if it is not one. */
export function toChangeLogRecord(parsed: unknown): ChangeLogRecord | null {
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) return null;
  const fields = new Map<string, unknown>(Object.entries(parsed));

  const eventId = fields.get('event_id');
  const timestamp = fields.get('timestamp');
  const option = fields.get('option') ?? null;
  const letter = fields.get('letter') ?? null;
  const access = fields.get('access');
  const requested = fields.get('requested');
  const previous = fields.get('previous');
  const outcome = fields.get('outcome');

  if (
    typeof eventId !== 'string' ||
    eventId === '' ||
    typeof timestamp !== 'string' ||
    !stringOrNull(option) ||
    !stringOrNull(letter) ||
    typeof access !== 'string' ||
    typeof requested !== 'number' ||
    typeof previous !== 'number' ||
    typeof outcome !== 'string'
  ) {
    return null;
  }

  return { event_id: eventId, timestamp, option, letter, access, requested, previous, outcome };
}

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

/**
 * Parse, deduplicate, and sort the change log given its raw text content.
 */
export function readLog(rawContent: string): LogReadResult {
  if (rawContent.length === 0) {
    return {
      records: [],
      stats: {
        totalLines: 0,
        parsedEvents: 0,
        duplicates: 0,
        parseErrors: 0,
        partialTrailingLine: false,
      },
    };
  }

  // The last element after split is an incomplete line unless the content
  // ends with '\n' (then it is the empty string).
  const partialTrailingLine = !rawContent.endsWith('\n');
  const lineList = rawContent
    .split('\n')
    .slice(0, -1)
    .filter((l) => l.length > 0);

  let duplicates = 0;
  let parseErrors = 0;
  const seen = new Set<string>();
  const records: ChangeLogRecord[] = [];

  for (const line of lineList) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch {
      parseErrors++;
      continue;
    }

    const record = toChangeLogRecord(parsed);
    if (record === null) {
      parseErrors++;
      continue;
    }

    if (seen.has(record.event_id)) {
      duplicates++;
      continue;
    }
    seen.add(record.event_id);
    records.push(record);
  }

  records.sort((a, b) => {
    if (a.timestamp < b.timestamp) return -1;
    if (a.timestamp > b.timestamp) return 1;
    if (a.event_id < b.event_id) return -1;
    if (a.event_id > b.event_id) return 1;
    return 0;
  });

  return {
    records,
    stats: {
      totalLines: lineList.length,
      parsedEvents: records.length,
      duplicates,
      parseErrors,
      partialTrailingLine,
    },
  };
}
