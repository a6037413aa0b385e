export { ROOT_CLASS_LABEL, StatsCollector, type StatsCollectorOptions } from "./collector.js";
export { parseCounterRecords, parseInteger, parseRateKbps, tokenize } from "./grammar.js";
export {
  type ClassStats,
  type Counter,
  type CounterRecord,
  type CounterSource,
  isKnown,
  type StatsSnapshot,
  UNKNOWN,
  type Unknown,
} from "./types.js";
