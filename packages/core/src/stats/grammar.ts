/**
 * Counter grammar.
 *
 * The listing is a sequence of records. A record starts with a header line
 * `class <kind> <id> [parent <id>] ...` and continues until the next
 * header. Values are found by label, not by column:
 *
 * - `Sent <bytes> bytes <packets> pkt`
 * - `dropped <packets>`
 * - `rate <n><unit>` with unit bit, Kbit, Mbit or Gbit
 *
 * A label that is absent or followed by something unparseable yields
 * {@link UNKNOWN}.
 *
 * @module stats/grammar
 */

import { type Counter, type CounterRecord, UNKNOWN } from "./types.js";

const HEADER_PATTERN = /^class\s+(\S+)\s+(\S+)(.*)$/;
const INTEGER_PATTERN = /^\d+$/;
const RATE_PATTERN = /^(\d+(?:\.\d+)?)(bit|Kbit|Mbit|Gbit)$/;

/** kbit/s per unit; plain bits are divided instead */
const RATE_UNIT_KBPS: Record<string, number> = {
  Kbit: 1,
  Mbit: 1000,
  Gbit: 1000000,
};

/**
 * Splits a stats line into tokens, dropping separators like `,` and `(`.
 */
export function tokenize(line: string): string[] {
  return line
    .replace(/[,()]/g, " ")
    .split(/\s+/)
    .filter((token) => token.length > 0);
}

export function parseInteger(token: string | undefined): Counter {
  if (token === undefined || !INTEGER_PATTERN.test(token)) {
    return UNKNOWN;
  }
  return Number(token);
}

export function parseRateKbps(token: string | undefined): Counter {
  const match = token === undefined ? null : RATE_PATTERN.exec(token);
  const value = match?.[1];
  const unit = match?.[2];
  if (value === undefined || unit === undefined) {
    return UNKNOWN;
  }
  if (unit === "bit") {
    return Number(value) / 1000;
  }
  const factor = RATE_UNIT_KBPS[unit];
  return factor === undefined ? UNKNOWN : Number(value) * factor;
}

/** Token after the first occurrence of `label` */
function after(tokens: readonly string[], label: string): string | undefined {
  const index = tokens.indexOf(label);
  return index === -1 ? undefined : tokens[index + 1];
}

/** Token before the first occurrence of `label` */
function before(tokens: readonly string[], label: string): string | undefined {
  const index = tokens.indexOf(label);
  return index <= 0 ? undefined : tokens[index - 1];
}

function parseBody(tokens: readonly string[]): Pick<CounterRecord, "packets" | "bytes" | "droppedPackets" | "currentRateKbps"> {
  const sentAt = tokens.indexOf("Sent");
  const sent = sentAt === -1 ? [] : tokens.slice(sentAt);

  return {
    bytes: sent[2] === "bytes" ? parseInteger(sent[1]) : UNKNOWN,
    packets: parseInteger(before(sent, "pkt")),
    droppedPackets: parseInteger(after(tokens, "dropped")),
    currentRateKbps: parseRateKbps(after(tokens, "rate")),
  };
}

/**
 * Parses a raw counter listing into records, in listing order.
 * Lines before the first header are ignored.
 */
export function parseCounterRecords(raw: string): CounterRecord[] {
  const records: CounterRecord[] = [];
  let header: { kind: string; classId: string; parentId?: string } | undefined;
  let body: string[] = [];

  const flush = (): void => {
    if (header) {
      records.push({ ...header, ...parseBody(body) });
    }
  };

  for (const line of raw.split(/\r?\n/)) {
    const match = HEADER_PATTERN.exec(line.trim());
    if (match) {
      flush();
      const [, kind = "", classId = "", rest = ""] = match;
      const parentId = after(tokenize(rest), "parent");
      header = { kind, classId, ...(parentId === undefined ? {} : { parentId }) };
      body = [];
    } else if (header) {
      body.push(...tokenize(line));
    }
  }
  flush();

  return records;
}
